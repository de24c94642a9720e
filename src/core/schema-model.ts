/**
 * Schema Model - Core Types
 *
 * The canonical intermediate representation of a relational schema.
 * Every generator consumes this; nothing downstream re-reads the source document.
 *
 * Instances are frozen once built. Relationship resolution and blueprint
 * building only ever read from them.
 */

import { isAuditField, toCamelCase, toPascalCase, toPropertyName, toSingular, uncapitalize } from './naming.js'

// =============================================================================
// COLUMN-LEVEL TYPES
// =============================================================================

/**
 * Referential action carried over from the DDL; rendered where the target ORM
 * can express it
 */
export type ForeignKeyAction = 'CASCADE' | 'SET_NULL' | 'SET_DEFAULT' | 'RESTRICT' | 'NO_ACTION'

export interface Column {
  name: string
  /** Symbolic source type such as `String`, `Long`, `LocalDateTime` */
  sourceType: string
  nullable: boolean
  unique: boolean
  primaryKey: boolean
  length?: number
  precision?: number
  scale?: number
  defaultValue?: string
  comment?: string
}

export interface ForeignKey {
  /** Column on the owning table */
  columnName: string
  /** Referenced table, matched case-insensitively */
  referencedTable: string
  referencedColumn: string
  /** Overrides the navigation property name derived from the column */
  fieldName?: string
  onDelete?: ForeignKeyAction
  onUpdate?: ForeignKeyAction
}

export interface Index {
  name?: string
  columns: readonly string[]
  unique: boolean
}

export interface FunctionParameter {
  name: string
  sourceType: string
}

/**
 * Stored function or procedure, attached to a table by name inference
 */
export interface StoredFunction {
  name: string
  parameters: readonly FunctionParameter[]
  returnType?: string
}

// =============================================================================
// TABLE
// =============================================================================

/**
 * Table as produced by the upstream parser. The junction flag is decided
 * upstream and taken as-is.
 */
export interface TableDefinition {
  name: string
  schema?: string
  comment?: string
  columns: readonly Column[]
  foreignKeys: readonly ForeignKey[]
  indexes: readonly Index[]
  primaryKey: readonly string[]
  junction: boolean
}

export interface Table extends TableDefinition {
  /** PascalCase singular: `order_items` → `OrderItem` */
  readonly entityName: string
  /** Lowercase with separators removed: `order_items` → `orderitems` */
  readonly moduleName: string
  /** camelCase entity name: `orderItem` */
  readonly variableName: string
}

export type RelationType = 'ONE_TO_ONE' | 'MANY_TO_ONE'

/**
 * A foreign key whose referenced table exists. Computed, never stored.
 */
export interface TableRelationship {
  sourceTable: Table
  targetTable: Table
  foreignKey: ForeignKey
  relationType: RelationType
}

const AUDIT_TABLE_SUFFIXES = ['_aud', '_audit']
const AUDIT_TABLE_NAMES = new Set(['revision_info', 'revinfo'])

/** Key used by {@link SchemaModel.functionsByTable} for functions no table claims */
export const GLOBAL_FUNCTIONS_KEY = '_global'

export function deriveEntityName(tableName: string): string {
  return toPascalCase(toSingular(tableName))
}

export function deriveModuleName(tableName: string): string {
  return tableName.toLowerCase().replace(/[_\-\s]/g, '')
}

export function createTable(definition: TableDefinition): Table {
  const entityName = deriveEntityName(definition.name)
  return Object.freeze({
    ...definition,
    columns: Object.freeze([...definition.columns]),
    foreignKeys: Object.freeze([...definition.foreignKeys]),
    indexes: Object.freeze([...definition.indexes]),
    primaryKey: Object.freeze([...definition.primaryKey]),
    entityName,
    moduleName: deriveModuleName(definition.name),
    variableName: uncapitalize(entityName),
  })
}

export function isAuditTable(table: Pick<Table, 'name'>): boolean {
  const name = table.name.toLowerCase()
  return AUDIT_TABLE_NAMES.has(name) || AUDIT_TABLE_SUFFIXES.some((suffix) => name.endsWith(suffix))
}

/**
 * Navigation property name for a foreign key: the override when present,
 * otherwise the camelCase column name without its `_id` suffix.
 *
 * @example
 * foreignKeyFieldName({ columnName: 'parent_category_id', ... }) // => "parentCategory"
 */
export function foreignKeyFieldName(foreignKey: ForeignKey): string {
  return foreignKey.fieldName ?? toCamelCase(toPropertyName(foreignKey.columnName))
}

/**
 * ONE_TO_ONE when the foreign-key column is unique on its own, either through
 * the column flag or a single-column unique index.
 */
export function inferRelationType(table: TableDefinition, foreignKey: ForeignKey): RelationType {
  const column = findColumn(table, foreignKey.columnName)
  if (column?.unique) return 'ONE_TO_ONE'

  const uniqueIndex = table.indexes.some(
    (index) =>
      index.unique &&
      index.columns.length === 1 &&
      index.columns[0].toLowerCase() === foreignKey.columnName.toLowerCase(),
  )
  return uniqueIndex ? 'ONE_TO_ONE' : 'MANY_TO_ONE'
}

export function findColumn(table: TableDefinition, columnName: string): Column | undefined {
  const wanted = columnName.toLowerCase()
  return table.columns.find((column) => column.name.toLowerCase() === wanted)
}

/**
 * Columns that carry business data: neither audit fields nor primary key
 */
export function businessColumns(table: TableDefinition): Column[] {
  const primaryKey = new Set(table.primaryKey.map((name) => name.toLowerCase()))
  return table.columns.filter(
    (column) => !column.primaryKey && !primaryKey.has(column.name.toLowerCase()) && !isAuditField(column.name),
  )
}

// =============================================================================
// SCHEMA
// =============================================================================

export interface SchemaDefinition {
  name?: string
  tables: readonly TableDefinition[]
  functions?: readonly StoredFunction[]
}

export class SchemaModel {
  readonly name: string
  readonly tables: readonly Table[]
  readonly functions: readonly StoredFunction[]

  private readonly byName: Map<string, Table>

  constructor(definition: SchemaDefinition) {
    this.name = definition.name ?? 'schema'
    this.tables = Object.freeze(definition.tables.map(createTable))
    this.functions = Object.freeze([...(definition.functions ?? [])])

    // First table wins on a case-insensitive clash
    this.byName = new Map()
    for (const table of this.tables) {
      const key = table.name.toLowerCase()
      if (!this.byName.has(key)) this.byName.set(key, table)
    }
  }

  getTable(name: string): Table | undefined {
    return this.byName.get(name.toLowerCase())
  }

  /**
   * Tables that become generated entities, in schema order
   */
  entityTables(): Table[] {
    return this.tables.filter((table) => !table.junction && !isAuditTable(table))
  }

  junctionTables(): Table[] {
    return this.tables.filter((table) => table.junction)
  }

  /**
   * Every foreign key whose referenced table exists, in schema order
   */
  allRelationships(): TableRelationship[] {
    const relationships: TableRelationship[] = []
    for (const table of this.tables) {
      for (const foreignKey of table.foreignKeys) {
        const targetTable = this.getTable(foreignKey.referencedTable)
        if (!targetTable) continue
        relationships.push({
          sourceTable: table,
          targetTable,
          foreignKey,
          relationType: inferRelationType(table, foreignKey),
        })
      }
    }
    return relationships
  }

  businessColumns(table: Table): Column[] {
    return businessColumns(table)
  }

  /**
   * Group stored functions by the table whose singular name they mention.
   * Unclaimed functions land under {@link GLOBAL_FUNCTIONS_KEY}.
   */
  functionsByTable(): Map<string, StoredFunction[]> {
    const grouped = new Map<string, StoredFunction[]>()
    for (const fn of this.functions) {
      const fnName = fn.name.toLowerCase()
      const owner = this.tables.find((table) => fnName.includes(toSingular(table.name.toLowerCase())))
      const key = owner?.name ?? GLOBAL_FUNCTIONS_KEY
      const bucket = grouped.get(key)
      if (bucket) {
        bucket.push(fn)
      } else {
        grouped.set(key, [fn])
      }
    }
    return grouped
  }

  /**
   * Structural problems a generator would trip over. Empty when the schema is
   * usable as-is.
   */
  validate(): string[] {
    const issues: string[] = []
    const entityNames = new Map<string, string>()

    for (const table of this.tables) {
      if (table.primaryKey.length === 0 && !table.columns.some((column) => column.primaryKey)) {
        issues.push(`Table '${table.name}' has no primary key`)
      }

      for (const foreignKey of table.foreignKeys) {
        if (!this.getTable(foreignKey.referencedTable)) {
          issues.push(
            `Table '${table.name}' column '${foreignKey.columnName}' references unknown table '${foreignKey.referencedTable}'`,
          )
        }
      }

      if (table.junction || isAuditTable(table)) continue
      const previous = entityNames.get(table.entityName)
      if (previous) {
        issues.push(`Tables '${previous}' and '${table.name}' both map to entity '${table.entityName}'`)
      } else {
        entityNames.set(table.entityName, table.name)
      }
    }

    return issues
  }
}
