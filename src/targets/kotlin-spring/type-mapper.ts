/**
 * Kotlin type table
 */

import { reservedWords } from '../reserved-words.js'
import { TableTypeMapper } from '../type-mapper.js'
import type { TypeTable } from '../type-mapper.js'

const SCALAR = {
  String: 'String',
  Integer: 'Int',
  Long: 'Long',
  Short: 'Short',
  Double: 'Double',
  Float: 'Float',
  BigDecimal: 'BigDecimal',
  Boolean: 'Boolean',
  LocalDate: 'LocalDate',
  LocalDateTime: 'LocalDateTime',
  LocalTime: 'LocalTime',
  Instant: 'Instant',
  ZonedDateTime: 'ZonedDateTime',
  UUID: 'UUID',
  'byte[]': 'ByteArray',
} as const

export const KOTLIN_TYPES: TypeTable = {
  scalar: SCALAR,
  nullable: {
    String: 'String?',
    Integer: 'Int?',
    Long: 'Long?',
    Short: 'Short?',
    Double: 'Double?',
    Float: 'Float?',
    BigDecimal: 'BigDecimal?',
    Boolean: 'Boolean?',
    LocalDate: 'LocalDate?',
    LocalDateTime: 'LocalDateTime?',
    LocalTime: 'LocalTime?',
    Instant: 'Instant?',
    ZonedDateTime: 'ZonedDateTime?',
    UUID: 'UUID?',
    'byte[]': 'ByteArray?',
  },
  imports: {
    BigDecimal: ['java.math.BigDecimal'],
    LocalDate: ['java.time.LocalDate'],
    LocalDateTime: ['java.time.LocalDateTime'],
    LocalTime: ['java.time.LocalTime'],
    Instant: ['java.time.Instant'],
    ZonedDateTime: ['java.time.ZonedDateTime'],
    UUID: ['java.util.UUID'],
  },
  defaults: {
    String: '""',
    Int: '0',
    Long: '0L',
    Short: '0',
    Double: '0.0',
    Float: '0.0f',
    Boolean: 'false',
    BigDecimal: 'BigDecimal.ZERO',
    LocalDate: 'LocalDate.EPOCH',
    LocalDateTime: 'LocalDateTime.of(1970, 1, 1, 0, 0)',
    LocalTime: 'LocalTime.MIDNIGHT',
    Instant: 'Instant.EPOCH',
    ZonedDateTime: 'ZonedDateTime.ofInstant(java.time.Instant.EPOCH, java.time.ZoneOffset.UTC)',
    UUID: 'UUID(0L, 0L)',
    ByteArray: 'ByteArray(0)',
  },
  nullLiteral: 'null',
  fallback: 'Any',
  primaryKey: 'Long',
  list: (element) => `List<${element}>`,
  collection: (element) => `MutableSet<${element}>`,
  keywords: reservedWords('kotlin'),
}

export const kotlinTypeMapper = new TableTypeMapper('kotlin-spring', KOTLIN_TYPES)
