/**
 * Relationship Resolver
 *
 * Derives outgoing, inverse and many-to-many relations from a SchemaModel.
 * Built once per schema before any per-table work and read-only afterwards.
 */

import type { Diagnostic } from './diagnostics.js'
import type { SchemaModel, Table, TableRelationship } from './schema-model.js'

/**
 * A many-to-many relation seen from one side of a junction table
 */
export interface ManyToManyRelation {
  junctionTable: string
  /** Junction column pointing at the table being generated */
  sourceColumn: string
  /** Junction column pointing at the other side */
  targetColumn: string
  otherTable: Table
}

/**
 * Everything a generator needs to know about one table's relations
 */
export interface ResolvedRelations {
  outgoing: readonly TableRelationship[]
  incoming: readonly TableRelationship[]
  manyToMany: readonly ManyToManyRelation[]
}

const EMPTY: readonly TableRelationship[] = Object.freeze([])

export class RelationshipResolver {
  private readonly relationships: readonly TableRelationship[]
  private readonly bySource: ReadonlyMap<string, readonly TableRelationship[]>

  constructor(private readonly schema: SchemaModel) {
    this.relationships = Object.freeze(schema.allRelationships())

    const bySource = new Map<string, TableRelationship[]>()
    for (const relationship of this.relationships) {
      const key = relationship.sourceTable.name
      const bucket = bySource.get(key)
      if (bucket) {
        bucket.push(relationship)
      } else {
        bySource.set(key, [relationship])
      }
    }
    this.bySource = bySource
  }

  /**
   * Resolved foreign keys grouped by owning table name
   */
  relationshipsBySource(): ReadonlyMap<string, readonly TableRelationship[]> {
    return this.bySource
  }

  outgoing(table: Table): readonly TableRelationship[] {
    return this.bySource.get(table.name) ?? EMPTY
  }

  /**
   * Relations that point at `table`, excluding those owned by junction tables
   * (those surface through {@link manyToMany} instead)
   */
  inverseRelationships(table: Table): TableRelationship[] {
    const name = table.name.toLowerCase()
    return this.relationships.filter(
      (relationship) =>
        relationship.targetTable.name.toLowerCase() === name && !relationship.sourceTable.junction,
    )
  }

  /**
   * One relation per junction table linking `table` to another table.
   *
   * Only junction tables with exactly two foreign keys take part. On a
   * self-referencing junction the first declared foreign key is this side.
   */
  manyToMany(table: Table): ManyToManyRelation[] {
    const name = table.name.toLowerCase()
    const relations: ManyToManyRelation[] = []

    for (const junction of this.schema.junctionTables()) {
      if (junction.foreignKeys.length !== 2) continue
      const [first, second] = junction.foreignKeys

      let thisSide = first
      let otherSide = second
      if (first.referencedTable.toLowerCase() !== name) {
        if (second.referencedTable.toLowerCase() !== name) continue
        thisSide = second
        otherSide = first
      }

      const otherTable = this.schema.getTable(otherSide.referencedTable)
      if (!otherTable) continue

      relations.push({
        junctionTable: junction.name,
        sourceColumn: thisSide.columnName,
        targetColumn: otherSide.columnName,
        otherTable,
      })
    }

    return relations
  }

  resolve(table: Table): ResolvedRelations {
    return {
      outgoing: this.outgoing(table),
      incoming: this.inverseRelationships(table),
      manyToMany: this.manyToMany(table),
    }
  }

  /**
   * Relations the resolver had to drop, one warning each
   */
  diagnostics(): Diagnostic[] {
    const diagnostics: Diagnostic[] = []

    for (const table of this.schema.tables) {
      if (table.junction && table.foreignKeys.length !== 2) {
        diagnostics.push({
          code: 'junction-arity',
          severity: 'warning',
          message: `Junction table has ${table.foreignKeys.length} foreign keys; many-to-many needs exactly 2`,
          table: table.name,
        })
      }

      for (const foreignKey of table.foreignKeys) {
        if (this.schema.getTable(foreignKey.referencedTable)) continue

        if (table.junction && table.foreignKeys.length === 2) {
          diagnostics.push({
            code: 'unmatched-junction',
            severity: 'warning',
            message: `Junction side references unknown table '${foreignKey.referencedTable}'; many-to-many skipped`,
            table: table.name,
            column: foreignKey.columnName,
          })
        } else {
          diagnostics.push({
            code: 'dangling-foreign-key',
            severity: 'warning',
            message: `References unknown table '${foreignKey.referencedTable}'; relation skipped`,
            table: table.name,
            column: foreignKey.columnName,
          })
        }
      }
    }

    return diagnostics
  }
}
