/**
 * Artifact Generator
 *
 * Per-table dispatch: builds the blueprint for a table from its relations and
 * hands it to the target renderer once per artifact kind. Output is an
 * ordered path → content map in kind order, then renderer order.
 */

import type { DiagnosticCollector } from '../core/diagnostics.js'
import type { ManyToManyRelation } from '../core/relationship-resolver.js'
import type { StoredFunction, Table, TableRelationship } from '../core/schema-model.js'
import { ARTIFACT_KINDS } from '../targets/renderer.js'
import type { ArtifactKind } from '../targets/renderer.js'
import type { TargetProfile } from '../targets/target.js'
import type { TypeMapper } from '../targets/type-mapper.js'
import { buildBlueprint } from './blueprint.js'
import type { EntityBlueprint } from './blueprint.js'

export interface ArtifactGeneratorOptions {
  namespace: string
  /** Kinds to emit, in emission order. Defaults to every kind. */
  kinds?: readonly ArtifactKind[]
  /** Stored functions keyed by owning table name */
  procedures?: ReadonlyMap<string, readonly StoredFunction[]>
  diagnostics?: DiagnosticCollector
}

export class ArtifactGenerator {
  private readonly kinds: readonly ArtifactKind[]

  constructor(
    private readonly target: TargetProfile,
    private readonly options: ArtifactGeneratorOptions,
  ) {
    this.kinds = options.kinds ?? ARTIFACT_KINDS
  }

  /**
   * Generate every configured artifact for one table
   */
  generate(
    table: Table,
    outgoing: readonly TableRelationship[],
    incoming: readonly TableRelationship[],
    manyToMany: readonly ManyToManyRelation[],
    typeMapper: TypeMapper = this.target.typeMapper,
  ): Map<string, string> {
    const blueprint = buildBlueprint(table, { outgoing, incoming, manyToMany }, typeMapper, {
      namespace: this.options.namespace,
      identifierCase: this.target.identifierCase,
      procedures: this.options.procedures?.get(table.name),
      diagnostics: this.options.diagnostics,
    })
    return this.render(blueprint)
  }

  render(blueprint: EntityBlueprint): Map<string, string> {
    const files = new Map<string, string>()
    for (const kind of this.kinds) {
      for (const file of this.target.renderer.render(kind, blueprint)) {
        files.set(file.path, file.content)
      }
    }
    return files
  }
}
