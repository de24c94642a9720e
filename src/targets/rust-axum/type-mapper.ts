/**
 * Rust type table (sqlx + serde)
 */

import { reservedWords } from '../reserved-words.js'
import { TableTypeMapper } from '../type-mapper.js'
import type { TypeTable } from '../type-mapper.js'

export const RUST_TYPES: TypeTable = {
  scalar: {
    String: 'String',
    Integer: 'i32',
    Long: 'i64',
    Short: 'i16',
    Double: 'f64',
    Float: 'f32',
    BigDecimal: 'Decimal',
    Boolean: 'bool',
    LocalDate: 'NaiveDate',
    LocalDateTime: 'NaiveDateTime',
    LocalTime: 'NaiveTime',
    Instant: 'DateTime<Utc>',
    ZonedDateTime: 'DateTime<Utc>',
    UUID: 'Uuid',
    'byte[]': 'Vec<u8>',
  },
  nullable: {
    String: 'Option<String>',
    Integer: 'Option<i32>',
    Long: 'Option<i64>',
    Short: 'Option<i16>',
    Double: 'Option<f64>',
    Float: 'Option<f32>',
    BigDecimal: 'Option<Decimal>',
    Boolean: 'Option<bool>',
    LocalDate: 'Option<NaiveDate>',
    LocalDateTime: 'Option<NaiveDateTime>',
    LocalTime: 'Option<NaiveTime>',
    Instant: 'Option<DateTime<Utc>>',
    ZonedDateTime: 'Option<DateTime<Utc>>',
    UUID: 'Option<Uuid>',
    'byte[]': 'Option<Vec<u8>>',
  },
  imports: {
    BigDecimal: ['rust_decimal::Decimal'],
    LocalDate: ['chrono::NaiveDate'],
    LocalDateTime: ['chrono::NaiveDateTime'],
    LocalTime: ['chrono::NaiveTime'],
    Instant: ['chrono::{DateTime, Utc}'],
    ZonedDateTime: ['chrono::{DateTime, Utc}'],
    UUID: ['uuid::Uuid'],
  },
  defaults: {
    String: 'String::new()',
    i32: '0',
    i64: '0',
    i16: '0',
    f64: '0.0',
    f32: '0.0',
    bool: 'false',
    Decimal: 'Decimal::ZERO',
    Uuid: 'Uuid::nil()',
    'Vec<u8>': 'Vec::new()',
    NaiveDate: 'NaiveDate::default()',
    NaiveDateTime: 'NaiveDateTime::default()',
    NaiveTime: 'NaiveTime::default()',
    'DateTime<Utc>': 'DateTime::<Utc>::default()',
  },
  nullLiteral: 'None',
  fallback: 'serde_json::Value',
  primaryKey: 'i64',
  list: (element) => `Vec<${element}>`,
  keywords: reservedWords('rust'),
}

export const rustTypeMapper = new TableTypeMapper('rust-axum', RUST_TYPES)
