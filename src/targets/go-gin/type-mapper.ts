/**
 * Go type table. Nullable columns become pointers.
 */

import { reservedWords } from '../reserved-words.js'
import { TableTypeMapper } from '../type-mapper.js'
import type { TypeTable } from '../type-mapper.js'

const TIME = ['time']
const DECIMAL = ['github.com/shopspring/decimal']
const UUID = ['github.com/google/uuid']

export const GO_TYPES: TypeTable = {
  scalar: {
    String: 'string',
    Integer: 'int32',
    Long: 'int64',
    Short: 'int16',
    Double: 'float64',
    Float: 'float32',
    BigDecimal: 'decimal.Decimal',
    Boolean: 'bool',
    LocalDate: 'time.Time',
    LocalDateTime: 'time.Time',
    LocalTime: 'time.Time',
    Instant: 'time.Time',
    ZonedDateTime: 'time.Time',
    UUID: 'uuid.UUID',
    'byte[]': '[]byte',
  },
  nullable: {
    String: '*string',
    Integer: '*int32',
    Long: '*int64',
    Short: '*int16',
    Double: '*float64',
    Float: '*float32',
    BigDecimal: '*decimal.Decimal',
    Boolean: '*bool',
    LocalDate: '*time.Time',
    LocalDateTime: '*time.Time',
    LocalTime: '*time.Time',
    Instant: '*time.Time',
    ZonedDateTime: '*time.Time',
    UUID: '*uuid.UUID',
    'byte[]': '*[]byte',
  },
  imports: {
    BigDecimal: DECIMAL,
    LocalDate: TIME,
    LocalDateTime: TIME,
    LocalTime: TIME,
    Instant: TIME,
    ZonedDateTime: TIME,
    UUID: UUID,
  },
  defaults: {
    string: '""',
    int32: '0',
    int64: '0',
    int16: '0',
    float64: '0',
    float32: '0',
    bool: 'false',
    'decimal.Decimal': 'decimal.Zero',
    'time.Time': 'time.Time{}',
    'uuid.UUID': 'uuid.Nil',
    '[]byte': '[]byte{}',
  },
  nullLiteral: 'nil',
  fallback: 'any',
  primaryKey: 'int64',
  list: (element) => `[]${element}`,
  keywords: reservedWords('go'),
}

export const goTypeMapper = new TableTypeMapper('go-gin', GO_TYPES)
