/**
 * Type Mapper Tests
 *
 * Every target must map every source type in both nullabilities, and keep the
 * nullable rendering distinct from the non-null one.
 */

import { describe, it, expect } from 'vitest'
import { goTypeMapper } from '../../src/targets/go-gin/type-mapper.js'
import { javaTypeMapper } from '../../src/targets/java-spring/type-mapper.js'
import { kotlinTypeMapper } from '../../src/targets/kotlin-spring/type-mapper.js'
import { pythonTypeMapper } from '../../src/targets/python-fastapi/type-mapper.js'
import { rustTypeMapper } from '../../src/targets/rust-axum/type-mapper.js'
import { isSourceType, SOURCE_TYPES } from '../../src/targets/type-mapper.js'
import { typescriptTypeMapper } from '../../src/targets/typescript-nestjs/type-mapper.js'

const MAPPERS = [javaTypeMapper, kotlinTypeMapper, typescriptTypeMapper, pythonTypeMapper, goTypeMapper, rustTypeMapper]

const NULL_LITERALS: Record<string, string> = {
  'java-spring': 'null',
  'kotlin-spring': 'null',
  'typescript-nestjs': 'null',
  'python-fastapi': 'None',
  'go-gin': 'nil',
  'rust-axum': 'None',
}

describe.each(MAPPERS.map((mapper) => [mapper.target, mapper] as const))('%s', (_target, mapper) => {
  it('maps every source type in both nullabilities', () => {
    for (const sourceType of SOURCE_TYPES) {
      expect(mapper.isMapped(sourceType)).toBe(true)
      expect(mapper.mapType(sourceType, false)).not.toBe(mapper.fallbackType)
      expect(mapper.mapType(sourceType, true)).not.toBe(mapper.mapType(sourceType, false))
    }
  })

  it('falls back for unknown source types', () => {
    expect(mapper.isMapped('Geometry')).toBe(false)
    expect(mapper.mapType('Geometry', false)).toBe(mapper.fallbackType)
    expect(mapper.mapType('Geometry', true)).toBe(mapper.fallbackType)
  })

  it('gives every non-null mapped type a zero value other than null', () => {
    const nullLiteral = NULL_LITERALS[mapper.target]
    expect(mapper.defaultValueFor(mapper.fallbackType)).toBe(nullLiteral)
    for (const sourceType of SOURCE_TYPES) {
      expect(mapper.defaultValueFor(mapper.mapType(sourceType, false))).not.toBe(nullLiteral)
    }
  })

  it('lists every source type', () => {
    expect(mapper.sourceTypes()).toEqual(SOURCE_TYPES)
  })
})

describe('isSourceType', () => {
  it('accepts only the symbolic source types', () => {
    expect(isSourceType('BigDecimal')).toBe(true)
    expect(isSourceType('byte[]')).toBe(true)
    expect(isSourceType('bigdecimal')).toBe(false)
  })
})

describe('java', () => {
  it('uses primitives for non-null and wrappers or @Nullable for nullable', () => {
    expect(javaTypeMapper.mapType('Long', false)).toBe('long')
    expect(javaTypeMapper.mapType('Long', true)).toBe('Long')
    expect(javaTypeMapper.mapType('String', true)).toBe('@Nullable String')
    expect(javaTypeMapper.mapType('byte[]', true)).toBe('byte @Nullable []')
  })

  it('adds the nullability annotation import only for nullable reference types', () => {
    expect(javaTypeMapper.requiredImports('Instant', false)).toEqual(['java.time.Instant'])
    expect(javaTypeMapper.requiredImports('Instant', true)).toEqual([
      'java.time.Instant',
      'org.jspecify.annotations.Nullable',
    ])
    expect(javaTypeMapper.requiredImports('Integer', true)).toEqual([])
    expect(javaTypeMapper.requiredImport('UUID', false)).toBe('java.util.UUID')
    expect(javaTypeMapper.requiredImport('String', false)).toBeUndefined()
  })

  it('renders default values by target type', () => {
    expect(javaTypeMapper.defaultValueFor('long')).toBe('0L')
    expect(javaTypeMapper.defaultValueFor('BigDecimal')).toBe('BigDecimal.ZERO')
    expect(javaTypeMapper.defaultValueFor('Long')).toBe('null')
  })

  it('uses fixed zero values for temporal and UUID types', () => {
    expect(javaTypeMapper.defaultValueFor('LocalDate')).toBe('LocalDate.EPOCH')
    expect(javaTypeMapper.defaultValueFor('Instant')).toBe('Instant.EPOCH')
    expect(javaTypeMapper.defaultValueFor('UUID')).toBe('new UUID(0L, 0L)')
  })

  it('uses sets for relation collections and lists otherwise', () => {
    expect(javaTypeMapper.collectionishType('Tag')).toBe('Set<Tag>')
    expect(javaTypeMapper.listType('Tag')).toBe('List<Tag>')
    expect(javaTypeMapper.primaryKeyType()).toBe('Long')
  })

  it('escapes reserved words', () => {
    expect(javaTypeMapper.escapeIdentifier('class')).toBe('class_')
    expect(javaTypeMapper.escapeIdentifier('label')).toBe('label')
  })
})

describe('other targets', () => {
  it('renders nullability the way each language does', () => {
    expect(kotlinTypeMapper.mapType('Integer', true)).toBe('Int?')
    expect(typescriptTypeMapper.mapType('Instant', true)).toBe('Date | null')
    expect(pythonTypeMapper.mapType('BigDecimal', true)).toBe('Decimal | None')
    expect(goTypeMapper.mapType('UUID', true)).toBe('*uuid.UUID')
    expect(rustTypeMapper.mapType('Long', true)).toBe('Option<i64>')
  })

  it('uses fixed zero values instead of the current time or random ids', () => {
    expect(kotlinTypeMapper.defaultValueFor('LocalDateTime')).toBe('LocalDateTime.of(1970, 1, 1, 0, 0)')
    expect(kotlinTypeMapper.defaultValueFor('UUID')).toBe('UUID(0L, 0L)')
    expect(pythonTypeMapper.defaultValueFor('datetime')).toBe('datetime.min')
    expect(pythonTypeMapper.defaultValueFor('UUID')).toBe('UUID(int=0)')
    expect(typescriptTypeMapper.defaultValueFor('Date')).toBe('new Date(0)')
    expect(rustTypeMapper.defaultValueFor('DateTime<Utc>')).toBe('DateTime::<Utc>::default()')
    expect(goTypeMapper.defaultValueFor('[]byte')).toBe('[]byte{}')
  })

  it('reports the imports each target type needs', () => {
    expect(pythonTypeMapper.requiredImports('BigDecimal', false)).toEqual(['from decimal import Decimal'])
    expect(pythonTypeMapper.requiredImports('Geometry', false)).toEqual(['from typing import Any'])
    expect(goTypeMapper.requiredImports('Instant', true)).toEqual(['time'])
    expect(rustTypeMapper.requiredImports('UUID', false)).toEqual(['uuid::Uuid'])
    expect(typescriptTypeMapper.requiredImports('UUID', false)).toEqual([])
  })

  it('escapes identifiers per language', () => {
    expect(pythonTypeMapper.escapeIdentifier('from')).toBe('from_')
    expect(goTypeMapper.escapeIdentifier('type')).toBe('type_')
    expect(rustTypeMapper.escapeIdentifier('type')).toBe('type_')
    expect(typescriptTypeMapper.escapeIdentifier('delete')).toBe('delete_')
  })
})
