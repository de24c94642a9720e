/**
 * Schema builders shared by the test suites
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { parseSchemaDocument } from '../../src/core/schema-loader.js'
import { createTable, SchemaModel } from '../../src/core/schema-model.js'
import type { Column, ForeignKey, Table, TableDefinition } from '../../src/core/schema-model.js'

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url))
}

export function loadCatalog(): SchemaModel {
  return parseSchemaDocument(JSON.parse(readFileSync(fixturePath('catalog-schema.json'), 'utf-8')))
}

export function column(name: string, sourceType: string, overrides: Partial<Column> = {}): Column {
  return { name, sourceType, nullable: true, unique: false, primaryKey: false, ...overrides }
}

export function fk(columnName: string, referencedTable: string, overrides: Partial<ForeignKey> = {}): ForeignKey {
  return { columnName, referencedTable, referencedColumn: 'id', ...overrides }
}

/**
 * Table definition with an `id` primary key prepended
 */
export function tableDef(name: string, parts: Partial<Omit<TableDefinition, 'name'>> = {}): TableDefinition {
  return {
    name,
    columns: [column('id', 'Long', { primaryKey: true, nullable: false }), ...(parts.columns ?? [])],
    foreignKeys: parts.foreignKeys ?? [],
    indexes: parts.indexes ?? [],
    primaryKey: parts.primaryKey ?? ['id'],
    junction: parts.junction ?? false,
    schema: parts.schema,
    comment: parts.comment,
  }
}

export function table(name: string, parts: Partial<Omit<TableDefinition, 'name'>> = {}): Table {
  return createTable(tableDef(name, parts))
}

export function schemaOf(...tables: TableDefinition[]): SchemaModel {
  return new SchemaModel({ name: 'test', tables })
}

/**
 * Look up a table the test knows exists
 */
export function mustGet(schema: SchemaModel, name: string): Table {
  const found = schema.getTable(name)
  if (!found) throw new Error(`Test schema has no table '${name}'`)
  return found
}
