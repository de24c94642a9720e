/**
 * Java type table
 *
 * Non-null numerics and booleans use primitives; nullable ones use the boxed
 * wrapper. Reference types carry a type-use `@Nullable` when nullable.
 */

import { reservedWords } from '../reserved-words.js'
import { TableTypeMapper } from '../type-mapper.js'
import type { TypeTable } from '../type-mapper.js'

const NULLABLE = 'org.jspecify.annotations.Nullable'

export const JAVA_TYPES: TypeTable = {
  scalar: {
    String: 'String',
    Integer: 'int',
    Long: 'long',
    Short: 'short',
    Double: 'double',
    Float: 'float',
    BigDecimal: 'BigDecimal',
    Boolean: 'boolean',
    LocalDate: 'LocalDate',
    LocalDateTime: 'LocalDateTime',
    LocalTime: 'LocalTime',
    Instant: 'Instant',
    ZonedDateTime: 'ZonedDateTime',
    UUID: 'UUID',
    'byte[]': 'byte[]',
  },
  nullable: {
    String: '@Nullable String',
    Integer: 'Integer',
    Long: 'Long',
    Short: 'Short',
    Double: 'Double',
    Float: 'Float',
    BigDecimal: '@Nullable BigDecimal',
    Boolean: 'Boolean',
    LocalDate: '@Nullable LocalDate',
    LocalDateTime: '@Nullable LocalDateTime',
    LocalTime: '@Nullable LocalTime',
    Instant: '@Nullable Instant',
    ZonedDateTime: '@Nullable ZonedDateTime',
    UUID: '@Nullable UUID',
    'byte[]': 'byte @Nullable []',
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
  nullableImports: {
    String: [NULLABLE],
    BigDecimal: [NULLABLE],
    LocalDate: [NULLABLE],
    LocalDateTime: [NULLABLE],
    LocalTime: [NULLABLE],
    Instant: [NULLABLE],
    ZonedDateTime: [NULLABLE],
    UUID: [NULLABLE],
    'byte[]': [NULLABLE],
  },
  defaults: {
    String: '""',
    int: '0',
    long: '0L',
    short: '(short) 0',
    double: '0.0',
    float: '0.0f',
    boolean: 'false',
    BigDecimal: 'BigDecimal.ZERO',
    LocalDate: 'LocalDate.EPOCH',
    LocalDateTime: 'LocalDateTime.of(1970, 1, 1, 0, 0)',
    LocalTime: 'LocalTime.MIDNIGHT',
    Instant: 'Instant.EPOCH',
    ZonedDateTime: 'ZonedDateTime.ofInstant(java.time.Instant.EPOCH, java.time.ZoneOffset.UTC)',
    UUID: 'new UUID(0L, 0L)',
    'byte[]': 'new byte[0]',
  },
  nullLiteral: 'null',
  fallback: 'Object',
  primaryKey: 'Long',
  list: (element) => `List<${element}>`,
  collection: (element) => `Set<${element}>`,
  keywords: reservedWords('java'),
}

export const javaTypeMapper = new TableTypeMapper('java-spring', JAVA_TYPES)
