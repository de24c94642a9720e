/**
 * Naming Engine
 *
 * Single source of truth for every identifier the generators derive from a
 * table or column name: entity and variable names, file names, plural
 * collection names and keyword-safe identifiers.
 *
 * All functions are total. `null`, `undefined` and `''` come back unchanged so
 * callers can pipe optional metadata through without guarding.
 */

type MaybeString = string | null | undefined

/**
 * Columns owned by the shared base entity rather than by a generated entity.
 * `active` is the base entity's soft-delete flag.
 */
export const AUDIT_FIELDS: ReadonlySet<string> = new Set([
  'id',
  'active',
  'activo',
  'estado',
  'created_at',
  'updated_at',
  'deleted_at',
  'created_by',
  'updated_by',
  'deleted_by',
])

// Acronym runs, capitalized words, lowercase words and digit runs, in any script
const WORD_PATTERN = /\p{Lu}+(?!\p{Ll})|\p{Lu}?[\p{Ll}\p{Lo}\p{M}]+|\p{N}+/gu

/**
 * Split an identifier into its words.
 *
 * Underscores, hyphens, whitespace and lower-to-upper case boundaries all
 * separate words.
 *
 * @example
 * splitWords("order_items") // => ["order", "items"]
 * splitWords("HTTPServer") // => ["HTTP", "Server"]
 */
export function splitWords(name: string): string[] {
  return name.match(WORD_PATTERN) ?? []
}

function titleWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}

/**
 * Uppercase the first character, leaving the rest alone
 */
export function capitalize(name: string): string
export function capitalize(name: MaybeString): MaybeString
export function capitalize(name: MaybeString): MaybeString {
  if (!name) return name
  return name.charAt(0).toUpperCase() + name.slice(1)
}

/**
 * Lowercase the first character, leaving the rest alone
 */
export function uncapitalize(name: string): string
export function uncapitalize(name: MaybeString): MaybeString
export function uncapitalize(name: MaybeString): MaybeString {
  if (!name) return name
  return name.charAt(0).toLowerCase() + name.slice(1)
}

/**
 * @example
 * toPascalCase("order_items") // => "OrderItems"
 * toPascalCase("userName") // => "UserName"
 */
export function toPascalCase(name: string): string
export function toPascalCase(name: MaybeString): MaybeString
export function toPascalCase(name: MaybeString): MaybeString {
  if (!name) return name
  return splitWords(name).map(titleWord).join('')
}

/**
 * @example
 * toCamelCase("created_by") // => "createdBy"
 * toCamelCase("OrderItem") // => "orderItem"
 */
export function toCamelCase(name: string): string
export function toCamelCase(name: MaybeString): MaybeString
export function toCamelCase(name: MaybeString): MaybeString {
  if (!name) return name
  return splitWords(name)
    .map((word, index) => (index === 0 ? word.toLowerCase() : titleWord(word)))
    .join('')
}

/**
 * @example
 * toSnakeCase("OrderItem") // => "order_item"
 */
export function toSnakeCase(name: string): string
export function toSnakeCase(name: MaybeString): MaybeString
export function toSnakeCase(name: MaybeString): MaybeString {
  if (!name) return name
  return splitWords(name)
    .map((word) => word.toLowerCase())
    .join('_')
}

/**
 * @example
 * toKebabCase("OrderItem") // => "order-item"
 */
export function toKebabCase(name: string): string
export function toKebabCase(name: MaybeString): MaybeString
export function toKebabCase(name: MaybeString): MaybeString {
  if (!name) return name
  return splitWords(name)
    .map((word) => word.toLowerCase())
    .join('-')
}

const VOWELS = 'aeiouAEIOU'

/**
 * English pluralization covering the shapes table and entity names take.
 *
 * @example
 * toPlural("category") // => "categories"
 * toPlural("day") // => "days"
 * toPlural("box") // => "boxes"
 */
export function toPlural(name: string): string
export function toPlural(name: MaybeString): MaybeString
export function toPlural(name: MaybeString): MaybeString {
  if (!name) return name
  const lower = name.toLowerCase()

  if (lower.endsWith('y') && name.length > 1 && !VOWELS.includes(name.charAt(name.length - 2))) {
    return name.slice(0, -1) + 'ies'
  }
  if (
    lower.endsWith('s') ||
    lower.endsWith('x') ||
    lower.endsWith('z') ||
    lower.endsWith('ch') ||
    lower.endsWith('sh')
  ) {
    return name + 'es'
  }
  return name + 's'
}

/**
 * Reverse of {@link toPlural} for table names.
 *
 * @example
 * toSingular("categories") // => "category"
 * toSingular("addresses") // => "address"
 * toSingular("status") // => "status"
 */
export function toSingular(name: string): string
export function toSingular(name: MaybeString): MaybeString
export function toSingular(name: MaybeString): MaybeString {
  if (!name) return name
  const lower = name.toLowerCase()

  if (lower.endsWith('ies') && name.length > 3) {
    return name.slice(0, -3) + 'y'
  }
  if (
    lower.endsWith('sses') ||
    lower.endsWith('xes') ||
    lower.endsWith('zzes') ||
    lower.endsWith('ches') ||
    lower.endsWith('shes') ||
    lower.endsWith('uses')
  ) {
    return name.slice(0, -2)
  }
  if (lower.endsWith('s') && !lower.endsWith('ss') && !lower.endsWith('us') && name.length > 1) {
    return name.slice(0, -1)
  }
  return name
}

/**
 * Strip a trailing `_id` so a foreign-key column names its navigation property.
 *
 * @example
 * toPropertyName("category_id") // => "category"
 * toPropertyName("Parent_ID") // => "Parent"
 * toPropertyName("_id") // => ""
 */
export function toPropertyName(columnName: string): string
export function toPropertyName(columnName: MaybeString): MaybeString
export function toPropertyName(columnName: MaybeString): MaybeString {
  if (!columnName) return columnName
  if (columnName.toLowerCase().endsWith('_id')) {
    return columnName.slice(0, -3)
  }
  return columnName
}

export function isAuditField(columnName: MaybeString): boolean {
  if (!columnName) return false
  return AUDIT_FIELDS.has(columnName.toLowerCase())
}

/**
 * Append `_` when `name` is a reserved word of the target language.
 */
export function escapeIfKeyword(name: string, keywords: ReadonlySet<string>): string
export function escapeIfKeyword(name: MaybeString, keywords: ReadonlySet<string>): MaybeString
export function escapeIfKeyword(name: MaybeString, keywords: ReadonlySet<string>): MaybeString {
  if (!name) return name
  return keywords.has(name) ? `${name}_` : name
}
