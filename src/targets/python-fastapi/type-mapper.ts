/**
 * Python type table (PEP 604 optionals)
 */

import { reservedWords } from '../reserved-words.js'
import { TableTypeMapper } from '../type-mapper.js'
import type { TypeTable } from '../type-mapper.js'

export const PYTHON_TYPES: TypeTable = {
  scalar: {
    String: 'str',
    Integer: 'int',
    Long: 'int',
    Short: 'int',
    Double: 'float',
    Float: 'float',
    BigDecimal: 'Decimal',
    Boolean: 'bool',
    LocalDate: 'date',
    LocalDateTime: 'datetime',
    LocalTime: 'time',
    Instant: 'datetime',
    ZonedDateTime: 'datetime',
    UUID: 'UUID',
    'byte[]': 'bytes',
  },
  nullable: {
    String: 'str | None',
    Integer: 'int | None',
    Long: 'int | None',
    Short: 'int | None',
    Double: 'float | None',
    Float: 'float | None',
    BigDecimal: 'Decimal | None',
    Boolean: 'bool | None',
    LocalDate: 'date | None',
    LocalDateTime: 'datetime | None',
    LocalTime: 'time | None',
    Instant: 'datetime | None',
    ZonedDateTime: 'datetime | None',
    UUID: 'UUID | None',
    'byte[]': 'bytes | None',
  },
  imports: {
    BigDecimal: ['from decimal import Decimal'],
    LocalDate: ['from datetime import date'],
    LocalDateTime: ['from datetime import datetime'],
    LocalTime: ['from datetime import time'],
    Instant: ['from datetime import datetime'],
    ZonedDateTime: ['from datetime import datetime'],
    UUID: ['from uuid import UUID'],
  },
  defaults: {
    str: '""',
    int: '0',
    float: '0.0',
    bool: 'False',
    Decimal: 'Decimal("0")',
    date: 'date.min',
    datetime: 'datetime.min',
    time: 'time.min',
    UUID: 'UUID(int=0)',
    bytes: 'b""',
  },
  nullLiteral: 'None',
  fallback: 'Any',
  fallbackImports: ['from typing import Any'],
  primaryKey: 'int',
  list: (element) => `list[${element}]`,
  keywords: reservedWords('python'),
}

export const pythonTypeMapper = new TableTypeMapper('python-fastapi', PYTHON_TYPES)
