/**
 * Schema Loader
 *
 * Reads the schema document written by the upstream SQL parser, validates it
 * with zod and builds a SchemaModel.
 *
 * This is where a table gets its junction flag: an explicit `junction` field
 * wins, otherwise a table whose two foreign-key columns make up its composite
 * primary key is a junction table.
 */

import { promises as fs } from 'fs'
import { resolve } from 'path'
import { z } from 'zod'
import { SchemaModel } from './schema-model.js'
import type { Column, ForeignKey, Index, SchemaDefinition, TableDefinition } from './schema-model.js'

const foreignKeyAction = z.enum(['CASCADE', 'SET_NULL', 'SET_DEFAULT', 'RESTRICT', 'NO_ACTION'])

const columnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  nullable: z.boolean().default(true),
  unique: z.boolean().default(false),
  primaryKey: z.boolean().default(false),
  length: z.number().int().positive().optional(),
  precision: z.number().int().positive().optional(),
  scale: z.number().int().nonnegative().optional(),
  defaultValue: z.string().optional(),
  comment: z.string().optional(),
})

const foreignKeySchema = z.object({
  column: z.string().min(1),
  references: z.string().min(1),
  referencedColumn: z.string().min(1).default('id'),
  fieldName: z.string().min(1).optional(),
  onDelete: foreignKeyAction.optional(),
  onUpdate: foreignKeyAction.optional(),
})

const indexSchema = z.object({
  name: z.string().min(1).optional(),
  columns: z.array(z.string().min(1)).min(1),
  unique: z.boolean().default(false),
})

const tableSchema = z.object({
  name: z.string().min(1),
  schema: z.string().optional(),
  comment: z.string().optional(),
  columns: z.array(columnSchema).min(1),
  primaryKey: z.array(z.string().min(1)).optional(),
  foreignKeys: z.array(foreignKeySchema).default([]),
  indexes: z.array(indexSchema).default([]),
  junction: z.boolean().optional(),
})

const functionSchema = z.object({
  name: z.string().min(1),
  parameters: z.array(z.object({ name: z.string().min(1), type: z.string().min(1) })).default([]),
  returnType: z.string().min(1).optional(),
})

export const schemaDocumentSchema = z.object({
  name: z.string().min(1).optional(),
  tables: z.array(tableSchema),
  functions: z.array(functionSchema).default([]),
})

export type SchemaDocument = z.input<typeof schemaDocumentSchema>
type ParsedTable = z.output<typeof tableSchema>

/**
 * Exactly two foreign keys whose columns form a two-column primary key
 */
export function looksLikeJunction(table: Pick<TableDefinition, 'foreignKeys' | 'primaryKey'>): boolean {
  if (table.foreignKeys.length !== 2 || table.primaryKey.length !== 2) return false
  const primaryKey = new Set(table.primaryKey.map((name) => name.toLowerCase()))
  return table.foreignKeys.every((foreignKey) => primaryKey.has(foreignKey.columnName.toLowerCase()))
}

function toTableDefinition(table: ParsedTable): TableDefinition {
  const primaryKey =
    table.primaryKey ?? table.columns.filter((column) => column.primaryKey).map((column) => column.name)
  const primaryKeySet = new Set(primaryKey.map((name) => name.toLowerCase()))

  const columns: Column[] = table.columns.map(({ type, ...column }) => ({
    ...column,
    sourceType: type,
    primaryKey: column.primaryKey || primaryKeySet.has(column.name.toLowerCase()),
  }))

  const foreignKeys: ForeignKey[] = table.foreignKeys.map(({ column, references, ...foreignKey }) => ({
    ...foreignKey,
    columnName: column,
    referencedTable: references,
  }))

  const indexes: Index[] = table.indexes

  const definition = {
    name: table.name,
    schema: table.schema,
    comment: table.comment,
    columns,
    foreignKeys,
    indexes,
    primaryKey,
  }
  return { ...definition, junction: table.junction ?? looksLikeJunction(definition) }
}

/**
 * Validate a parsed JSON value and build the model.
 *
 * @throws Error listing every zod issue with its path
 */
export function parseSchemaDocument(input: unknown): SchemaModel {
  const result = schemaDocumentSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n')
    throw new Error(`Invalid schema document:\n${issues}`)
  }

  const document = result.data
  const definition: SchemaDefinition = {
    name: document.name,
    tables: document.tables.map(toTableDefinition),
    functions: document.functions.map((fn) => ({
      name: fn.name,
      returnType: fn.returnType,
      parameters: fn.parameters.map((parameter) => ({ name: parameter.name, sourceType: parameter.type })),
    })),
  }
  return new SchemaModel(definition)
}

/**
 * Load a schema document from a JSON file
 */
export async function loadSchemaFile(path: string): Promise<SchemaModel> {
  const absolutePath = resolve(path)
  let content: string
  try {
    content = await fs.readFile(absolutePath, 'utf8')
  } catch (error) {
    throw new Error(`Failed to read schema file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new Error(`Schema file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }
  return parseSchemaDocument(parsed)
}
