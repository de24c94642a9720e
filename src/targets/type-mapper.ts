/**
 * Type Mapper
 *
 * Maps the schema's symbolic source types onto one target language. Each target
 * supplies a {@link TypeTable}; {@link TableTypeMapper} turns it into the
 * {@link TypeMapper} contract the blueprint builder consumes.
 */

import { escapeIfKeyword } from '../core/naming.js'

export const SOURCE_TYPES = [
  'String',
  'Integer',
  'Long',
  'Short',
  'Double',
  'Float',
  'BigDecimal',
  'Boolean',
  'LocalDate',
  'LocalDateTime',
  'LocalTime',
  'Instant',
  'ZonedDateTime',
  'UUID',
  'byte[]',
] as const

export type SourceType = (typeof SOURCE_TYPES)[number]

const SOURCE_TYPE_SET: ReadonlySet<string> = new Set(SOURCE_TYPES)

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPE_SET.has(value)
}

export interface TypeMapper {
  /** Target id the mapper belongs to */
  readonly target: string
  /** Type used for any source type the mapper does not know */
  readonly fallbackType: string

  mapType(sourceType: string, nullable: boolean): string
  isMapped(sourceType: string): boolean
  /** Zero value for a field of `targetType`; the null literal for nullable types */
  defaultValueFor(targetType: string): string
  /** First import the type needs, if any */
  requiredImport(sourceType: string, nullable: boolean): string | undefined
  /** Every import the type needs, in declaration order */
  requiredImports(sourceType: string, nullable: boolean): readonly string[]
  primaryKeyType(): string
  listType(element: string): string
  /** Collection type used for to-many navigation properties */
  collectionishType(element: string): string
  escapeIdentifier(name: string): string
  sourceTypes(): readonly SourceType[]
}

export type TypeImports = Readonly<Partial<Record<SourceType, readonly string[]>>>

/**
 * Constant per-target mapping data. `scalar` and `nullable` are kept apart so
 * every source type has a distinct nullable rendering.
 */
export interface TypeTable {
  scalar: Readonly<Record<SourceType, string>>
  nullable: Readonly<Record<SourceType, string>>
  imports?: TypeImports
  nullableImports?: TypeImports
  /** Zero values keyed by target type; missing entries use `nullLiteral` */
  defaults: Readonly<Record<string, string>>
  nullLiteral: string
  fallback: string
  fallbackImports?: readonly string[]
  primaryKey: string
  list: (element: string) => string
  collection?: (element: string) => string
  keywords: ReadonlySet<string>
}

const NO_IMPORTS: readonly string[] = Object.freeze([])

export class TableTypeMapper implements TypeMapper {
  readonly fallbackType: string

  constructor(
    readonly target: string,
    private readonly table: TypeTable,
  ) {
    this.fallbackType = table.fallback
  }

  mapType(sourceType: string, nullable: boolean): string {
    if (!isSourceType(sourceType)) return this.table.fallback
    return nullable ? this.table.nullable[sourceType] : this.table.scalar[sourceType]
  }

  isMapped(sourceType: string): boolean {
    return isSourceType(sourceType)
  }

  defaultValueFor(targetType: string): string {
    return this.table.defaults[targetType] ?? this.table.nullLiteral
  }

  requiredImport(sourceType: string, nullable: boolean): string | undefined {
    return this.requiredImports(sourceType, nullable)[0]
  }

  requiredImports(sourceType: string, nullable: boolean): readonly string[] {
    if (!isSourceType(sourceType)) return this.table.fallbackImports ?? NO_IMPORTS
    const scalar = this.table.imports?.[sourceType] ?? NO_IMPORTS
    if (!nullable) return scalar
    const extra = this.table.nullableImports?.[sourceType] ?? NO_IMPORTS
    return extra.length === 0 ? scalar : [...scalar, ...extra]
  }

  primaryKeyType(): string {
    return this.table.primaryKey
  }

  listType(element: string): string {
    return this.table.list(element)
  }

  collectionishType(element: string): string {
    return (this.table.collection ?? this.table.list)(element)
  }

  escapeIdentifier(name: string): string {
    return escapeIfKeyword(name, this.table.keywords)
  }

  sourceTypes(): readonly SourceType[] {
    return SOURCE_TYPES
  }
}
