/**
 * Target Registry
 *
 * Lookup of every output ecosystem by id. The default registry carries all
 * six built-in targets; tests may build one with a subset.
 */

import { ginFeatures } from './go-gin/features.js'
import { GinRenderer } from './go-gin/renderer.js'
import { goTypeMapper } from './go-gin/type-mapper.js'
import { springFeatures } from './java-spring/features.js'
import { SpringRenderer } from './java-spring/renderer.js'
import { javaTypeMapper } from './java-spring/type-mapper.js'
import { kotlinFeatures } from './kotlin-spring/features.js'
import { KotlinSpringRenderer } from './kotlin-spring/renderer.js'
import { kotlinTypeMapper } from './kotlin-spring/type-mapper.js'
import { fastApiFeatures } from './python-fastapi/features.js'
import { FastApiRenderer } from './python-fastapi/renderer.js'
import { pythonTypeMapper } from './python-fastapi/type-mapper.js'
import { axumFeatures } from './rust-axum/features.js'
import { AxumRenderer } from './rust-axum/renderer.js'
import { rustTypeMapper } from './rust-axum/type-mapper.js'
import { TARGET_IDS } from './target.js'
import type { TargetId, TargetProfile } from './target.js'
import { nestFeatures } from './typescript-nestjs/features.js'
import { NestRenderer } from './typescript-nestjs/renderer.js'
import { typescriptTypeMapper } from './typescript-nestjs/type-mapper.js'

export class TargetRegistry {
  private readonly profiles = new Map<string, TargetProfile>()

  constructor(profiles: Iterable<TargetProfile> = []) {
    for (const profile of profiles) this.register(profile)
  }

  register(profile: TargetProfile): void {
    this.profiles.set(profile.id, profile)
  }

  get(id: string): TargetProfile | undefined {
    return this.profiles.get(id)
  }

  /**
   * Look up a target, failing on an unknown id
   */
  require(id: string): TargetProfile {
    const profile = this.profiles.get(id)
    if (!profile) {
      throw new Error(`Unknown target '${id}'. Available targets: ${this.ids().join(', ')}`)
    }
    return profile
  }

  list(): TargetProfile[] {
    return [...this.profiles.values()]
  }

  ids(): TargetId[] {
    return this.list().map((profile) => profile.id)
  }
}

export function builtinTargets(): TargetProfile[] {
  const profiles: Record<TargetId, TargetProfile> = {
    'java-spring': {
      id: 'java-spring',
      displayName: 'Java / Spring Boot',
      language: 'java',
      framework: 'Spring Boot 3 + JPA',
      identifierCase: 'camel',
      typeMapper: javaTypeMapper,
      renderer: new SpringRenderer(),
      features: springFeatures,
    },
    'kotlin-spring': {
      id: 'kotlin-spring',
      displayName: 'Kotlin / Spring Boot',
      language: 'kotlin',
      framework: 'Spring Boot 3 + JPA',
      identifierCase: 'camel',
      typeMapper: kotlinTypeMapper,
      renderer: new KotlinSpringRenderer(),
      features: kotlinFeatures,
    },
    'typescript-nestjs': {
      id: 'typescript-nestjs',
      displayName: 'TypeScript / NestJS',
      language: 'typescript',
      framework: 'NestJS 10 + TypeORM',
      identifierCase: 'camel',
      typeMapper: typescriptTypeMapper,
      renderer: new NestRenderer(),
      features: nestFeatures,
    },
    'python-fastapi': {
      id: 'python-fastapi',
      displayName: 'Python / FastAPI',
      language: 'python',
      framework: 'FastAPI + SQLAlchemy 2',
      identifierCase: 'snake',
      typeMapper: pythonTypeMapper,
      renderer: new FastApiRenderer(pythonTypeMapper.fallbackType),
      features: fastApiFeatures,
    },
    'go-gin': {
      id: 'go-gin',
      displayName: 'Go / Gin',
      language: 'go',
      framework: 'Gin + GORM',
      identifierCase: 'pascal',
      typeMapper: goTypeMapper,
      renderer: new GinRenderer(),
      features: ginFeatures,
    },
    'rust-axum': {
      id: 'rust-axum',
      displayName: 'Rust / Axum',
      language: 'rust',
      framework: 'Axum + sqlx',
      identifierCase: 'snake',
      typeMapper: rustTypeMapper,
      renderer: new AxumRenderer(),
      features: axumFeatures,
    },
  }
  return TARGET_IDS.map((id) => profiles[id])
}

export const defaultRegistry = new TargetRegistry(builtinTargets())
