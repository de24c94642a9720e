/**
 * Entity Blueprint
 *
 * The target-neutral description of what to emit for one table: scalar fields,
 * navigation properties, join collections, indexes, imports and stored
 * procedures. Renderers decide how each piece looks in their language; they
 * never go back to the schema.
 */

import type { DiagnosticCollector } from '../core/diagnostics.js'
import { toCamelCase, toKebabCase, toPascalCase, toPlural, toSnakeCase } from '../core/naming.js'
import type { ManyToManyRelation, ResolvedRelations } from '../core/relationship-resolver.js'
import { businessColumns, findColumn, foreignKeyFieldName } from '../core/schema-model.js'
import type { ForeignKeyAction, StoredFunction, Table, TableRelationship } from '../core/schema-model.js'
import type { TypeMapper } from '../targets/type-mapper.js'

/**
 * How a target spells field and method identifiers
 */
export type IdentifierCase = 'camel' | 'snake' | 'pascal'

/**
 * Names of a table's entity in every spelling a renderer needs
 */
export interface EntityRef {
  tableName: string
  entityName: string
  variableName: string
  /** Pluralized variable name: `orderItems` */
  pluralName: string
  moduleName: string
  kebabName: string
  snakeName: string
}

export interface ScalarField {
  name: string
  columnName: string
  sourceType: string
  type: string
  nullable: boolean
  unique: boolean
  length?: number
  precision?: number
  scale?: number
  /** Column default as written in the DDL, rendered as a database-side default */
  columnDefault?: string
  /** Zero value of `type` in the target language */
  zeroValue: string
}

export type ReferenceKind = 'one-to-one' | 'many-to-one'

/**
 * Single-valued navigation owned by this table (it holds the foreign key)
 */
export interface ReferenceField {
  kind: ReferenceKind
  name: string
  /** Name of the plain id property DTOs expose instead of the navigation */
  idName: string
  idType: string
  columnName: string
  referencedColumn: string
  target: EntityRef
  nullable: boolean
  unique: boolean
  onDelete?: ForeignKeyAction
}

/**
 * To-many navigation mapped by a reference on the child
 */
export interface CollectionField {
  name: string
  type: string
  element: EntityRef
  /** Reference name on the child that owns the relation */
  mappedBy: string
  /** Foreign-key column on the child */
  foreignKeyColumn: string
  cascade: readonly ('persist' | 'merge')[]
}

/**
 * Single-valued inverse side of another table's one-to-one reference
 */
export interface BackReferenceField {
  name: string
  source: EntityRef
  mappedBy: string
  foreignKeyColumn: string
}

export interface JoinField {
  name: string
  type: string
  element: EntityRef
  joinTable: string
  joinColumn: string
  inverseJoinColumn: string
}

export interface IndexSpec {
  name: string
  columns: readonly string[]
  unique: boolean
}

export interface ProcedureParameter {
  name: string
  type: string
}

export interface ProcedureSpec {
  name: string
  methodName: string
  parameters: readonly ProcedureParameter[]
  returnType?: string
}

export interface EntityBlueprint {
  namespace: string
  entity: EntityRef
  comment?: string
  schemaName?: string
  primaryKeyType: string
  fields: readonly ScalarField[]
  references: readonly ReferenceField[]
  collections: readonly CollectionField[]
  backReferences: readonly BackReferenceField[]
  joins: readonly JoinField[]
  indexes: readonly IndexSpec[]
  /** Type imports in first-use order, without duplicates */
  imports: readonly string[]
  procedures: readonly ProcedureSpec[]
}

export interface BlueprintContext {
  namespace: string
  identifierCase: IdentifierCase
  /** Stored functions attributed to the table */
  procedures?: readonly StoredFunction[]
  diagnostics?: DiagnosticCollector
}

export function entityRef(table: Table): EntityRef {
  return {
    tableName: table.name,
    entityName: table.entityName,
    variableName: table.variableName,
    pluralName: toPlural(table.variableName),
    moduleName: table.moduleName,
    kebabName: toKebabCase(table.entityName),
    snakeName: toSnakeCase(table.entityName),
  }
}

export function recase(name: string, identifierCase: IdentifierCase): string {
  switch (identifierCase) {
    case 'camel':
      return toCamelCase(name)
    case 'snake':
      return toSnakeCase(name)
    case 'pascal':
      return toPascalCase(name)
  }
}

export function defaultIndexName(tableName: string, columns: readonly string[], unique: boolean): string {
  return `${unique ? 'uk' : 'idx'}_${tableName}_${columns.join('_')}`.toLowerCase()
}

/**
 * Build the blueprint for one table from its resolved relations.
 *
 * Foreign-key columns with a resolved relation become navigation properties
 * and are left out of the scalar fields; dangling ones stay scalar.
 */
export function buildBlueprint(
  table: Table,
  relations: ResolvedRelations,
  typeMapper: TypeMapper,
  context: BlueprintContext,
): EntityBlueprint {
  const imports = new Set<string>()
  const used = new Set<string>()
  const identifier = (name: string): string => typeMapper.escapeIdentifier(recase(name, context.identifierCase))

  // Later members that collide with an earlier name get a qualifier, then a counter
  const claim = (preferred: string, qualifier: string): string => {
    let name = identifier(preferred)
    if (used.has(name)) {
      const qualified = `${qualifier}_${preferred}`
      name = identifier(qualified)
      for (let counter = 2; used.has(name); counter++) name = identifier(`${qualified}_${counter}`)
    }
    used.add(name)
    return name
  }

  const mapped = (sourceType: string, nullable: boolean, column?: string): string => {
    if (!typeMapper.isMapped(sourceType)) {
      context.diagnostics?.warn(
        'unmapped-type',
        `No ${typeMapper.target} mapping for '${sourceType}'; using ${typeMapper.fallbackType}`,
        { table: table.name, column },
      )
    }
    for (const entry of typeMapper.requiredImports(sourceType, nullable)) imports.add(entry)
    return typeMapper.mapType(sourceType, nullable)
  }

  const resolvedColumns = new Set(
    relations.outgoing.map((relationship) => relationship.foreignKey.columnName.toLowerCase()),
  )

  const fields: ScalarField[] = []
  for (const column of businessColumns(table)) {
    if (resolvedColumns.has(column.name.toLowerCase())) continue

    const type = mapped(column.sourceType, column.nullable, column.name)
    fields.push({
      name: claim(column.name, 'field'),
      columnName: column.name,
      sourceType: column.sourceType,
      type,
      nullable: column.nullable,
      unique: column.unique,
      length: column.length,
      precision: column.precision,
      scale: column.scale,
      columnDefault: column.defaultValue,
      zeroValue: typeMapper.defaultValueFor(type),
    })
  }

  const references = relations.outgoing.map((relationship) => referenceField(relationship, mapped, identifier, claim))

  const collections: CollectionField[] = []
  const backReferences: BackReferenceField[] = []
  for (const relationship of relations.incoming) {
    const source = entityRef(relationship.sourceTable)
    const mappedBy = identifier(foreignKeyFieldName(relationship.foreignKey))
    const qualifier = foreignKeyFieldName(relationship.foreignKey)

    if (relationship.relationType === 'ONE_TO_ONE') {
      backReferences.push({
        name: claim(source.variableName, qualifier),
        source,
        mappedBy,
        foreignKeyColumn: relationship.foreignKey.columnName,
      })
    } else {
      collections.push({
        name: claim(source.pluralName, qualifier),
        type: typeMapper.collectionishType(source.entityName),
        element: source,
        mappedBy,
        foreignKeyColumn: relationship.foreignKey.columnName,
        cascade: ['persist', 'merge'],
      })
    }
  }

  const joins = relations.manyToMany.map((relation) => joinField(relation, typeMapper, claim))

  const indexes: IndexSpec[] = table.indexes.map((index) => ({
    name: index.name ?? defaultIndexName(table.name, index.columns, index.unique),
    columns: index.columns,
    unique: index.unique,
  }))

  const procedures: ProcedureSpec[] = (context.procedures ?? []).map((fn) => ({
    name: fn.name,
    methodName: identifier(fn.name),
    parameters: fn.parameters.map((parameter) => ({
      name: identifier(parameter.name.replace(/^p_/i, '')),
      type: mapped(parameter.sourceType, false),
    })),
    returnType: fn.returnType ? mapped(fn.returnType, true) : undefined,
  }))

  return {
    namespace: context.namespace,
    entity: entityRef(table),
    comment: table.comment,
    schemaName: table.schema,
    primaryKeyType: typeMapper.primaryKeyType(),
    fields,
    references,
    collections,
    backReferences,
    joins,
    indexes,
    imports: [...imports],
    procedures,
  }
}

function referenceField(
  relationship: TableRelationship,
  mapped: (sourceType: string, nullable: boolean, column?: string) => string,
  identifier: (name: string) => string,
  claim: (preferred: string, qualifier: string) => string,
): ReferenceField {
  const { foreignKey, sourceTable, targetTable } = relationship
  const column = findColumn(sourceTable, foreignKey.columnName)
  const oneToOne = relationship.relationType === 'ONE_TO_ONE'
  const nullable = column?.nullable ?? true

  return {
    kind: oneToOne ? 'one-to-one' : 'many-to-one',
    name: claim(foreignKeyFieldName(foreignKey), 'ref'),
    idName: identifier(foreignKey.columnName),
    idType: mapped(column?.sourceType ?? 'Long', nullable, foreignKey.columnName),
    columnName: foreignKey.columnName,
    referencedColumn: foreignKey.referencedColumn,
    target: entityRef(targetTable),
    nullable,
    unique: oneToOne,
    onDelete: foreignKey.onDelete,
  }
}

function joinField(
  relation: ManyToManyRelation,
  typeMapper: TypeMapper,
  claim: (preferred: string, qualifier: string) => string,
): JoinField {
  const element = entityRef(relation.otherTable)
  return {
    name: claim(element.pluralName, relation.junctionTable),
    type: typeMapper.collectionishType(element.entityName),
    element,
    joinTable: relation.junctionTable,
    joinColumn: relation.sourceColumn,
    inverseJoinColumn: relation.targetColumn,
  }
}
