/**
 * TypeScript type table (TypeORM column types)
 */

import { reservedWords } from '../reserved-words.js'
import { TableTypeMapper } from '../type-mapper.js'
import type { TypeTable } from '../type-mapper.js'

export const TYPESCRIPT_TYPES: TypeTable = {
  scalar: {
    String: 'string',
    Integer: 'number',
    Long: 'number',
    Short: 'number',
    Double: 'number',
    Float: 'number',
    BigDecimal: 'string',
    Boolean: 'boolean',
    LocalDate: 'string',
    LocalDateTime: 'Date',
    LocalTime: 'string',
    Instant: 'Date',
    ZonedDateTime: 'Date',
    UUID: 'string',
    'byte[]': 'Buffer',
  },
  nullable: {
    String: 'string | null',
    Integer: 'number | null',
    Long: 'number | null',
    Short: 'number | null',
    Double: 'number | null',
    Float: 'number | null',
    BigDecimal: 'string | null',
    Boolean: 'boolean | null',
    LocalDate: 'string | null',
    LocalDateTime: 'Date | null',
    LocalTime: 'string | null',
    Instant: 'Date | null',
    ZonedDateTime: 'Date | null',
    UUID: 'string | null',
    'byte[]': 'Buffer | null',
  },
  defaults: {
    string: "''",
    number: '0',
    boolean: 'false',
    Date: 'new Date(0)',
    Buffer: 'Buffer.alloc(0)',
  },
  nullLiteral: 'null',
  fallback: 'unknown',
  primaryKey: 'number',
  list: (element) => `${element}[]`,
  keywords: reservedWords('typescript'),
}

export const typescriptTypeMapper = new TableTypeMapper('typescript-nestjs', TYPESCRIPT_TYPES)
