/**
 * Target Profile
 *
 * Everything the engine needs to know about one output ecosystem.
 */

import type { FeaturePackSet } from '../features/feature-pack.js'
import type { IdentifierCase } from '../generators/blueprint.js'
import type { TargetRenderer } from './renderer.js'
import type { TargetLanguage } from './reserved-words.js'
import type { TypeMapper } from './type-mapper.js'

export const TARGET_IDS = [
  'java-spring',
  'kotlin-spring',
  'typescript-nestjs',
  'python-fastapi',
  'go-gin',
  'rust-axum',
] as const

export type TargetId = (typeof TARGET_IDS)[number]

export function isTargetId(value: string): value is TargetId {
  return TARGET_IDS.some((id) => id === value)
}

export interface TargetProfile {
  id: TargetId
  displayName: string
  language: TargetLanguage
  framework: string
  identifierCase: IdentifierCase
  typeMapper: TypeMapper
  renderer: TargetRenderer
  /** Feature packs this target can render; anything absent is unsupported */
  features: FeaturePackSet
}
