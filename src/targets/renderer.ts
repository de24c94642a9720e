/**
 * Target Renderer
 *
 * Turns entity blueprints into source files for one target ecosystem. A
 * renderer only decides layout and syntax; what to emit is settled in the
 * blueprint.
 */

import type { FeatureId } from '../features/feature-pack.js'
import type { EntityBlueprint, EntityRef } from '../generators/blueprint.js'

export const ARTIFACT_KINDS = ['entity', 'dto', 'repository', 'service', 'controller', 'test'] as const

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number]

export interface RenderedFile {
  path: string
  content: string
}

/**
 * Project-wide facts shared files are rendered from
 */
export interface ProjectContext {
  namespace: string
  projectName: string
  /** Entity tables in schema order */
  entities: readonly EntityRef[]
  /** Feature packs this run generates */
  features: readonly FeatureId[]
}

export abstract class TargetRenderer {
  /** Files every generated project of this target carries (base entity, app wiring) */
  abstract shared(project: ProjectContext): RenderedFile[]

  render(kind: ArtifactKind, blueprint: EntityBlueprint): RenderedFile[] {
    switch (kind) {
      case 'entity':
        return this.entity(blueprint)
      case 'dto':
        return this.dto(blueprint)
      case 'repository':
        return this.repository(blueprint)
      case 'service':
        return this.service(blueprint)
      case 'controller':
        return this.controller(blueprint)
      case 'test':
        return this.test(blueprint)
    }
  }

  protected abstract entity(blueprint: EntityBlueprint): RenderedFile[]
  protected abstract dto(blueprint: EntityBlueprint): RenderedFile[]
  protected abstract repository(blueprint: EntityBlueprint): RenderedFile[]
  protected abstract service(blueprint: EntityBlueprint): RenderedFile[]
  protected abstract controller(blueprint: EntityBlueprint): RenderedFile[]
  protected abstract test(blueprint: EntityBlueprint): RenderedFile[]
}

/**
 * Join generated lines into file content with a trailing newline
 */
export function joinLines(lines: readonly string[]): string {
  return lines.join('\n') + '\n'
}

/**
 * Escape a value for a double-quoted string literal
 */
export function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}
