/**
 * Naming Engine Tests
 */

import { describe, it, expect } from 'vitest'
import {
  escapeIfKeyword,
  isAuditField,
  splitWords,
  toCamelCase,
  toKebabCase,
  toPascalCase,
  toPlural,
  toPropertyName,
  toSingular,
  toSnakeCase,
} from '../../src/core/naming.js'

describe('case conversion', () => {
  it('splits on separators and case boundaries', () => {
    expect(splitWords('order_items')).toEqual(['order', 'items'])
    expect(splitWords('parent-category')).toEqual(['parent', 'category'])
    expect(splitWords('HTTPServer')).toEqual(['HTTP', 'Server'])
    expect(splitWords('line2Item')).toEqual(['line', '2', 'Item'])
  })

  it('converts snake_case table names', () => {
    expect(toPascalCase('order_items')).toBe('OrderItems')
    expect(toCamelCase('order_items')).toBe('orderItems')
    expect(toKebabCase('order_items')).toBe('order-items')
    expect(toSnakeCase('order_items')).toBe('order_items')
  })

  it('converts PascalCase entity names', () => {
    expect(toSnakeCase('OrderItem')).toBe('order_item')
    expect(toKebabCase('OrderItem')).toBe('order-item')
    expect(toCamelCase('OrderItem')).toBe('orderItem')
  })

  it('normalizes uppercase input', () => {
    expect(toPascalCase('PRODUCT_TAGS')).toBe('ProductTags')
    expect(toCamelCase('CREATED_BY')).toBe('createdBy')
  })

  it('keeps accented and non-Latin letters', () => {
    expect(toPascalCase('año')).toBe('Año')
    expect(toCamelCase('descripción')).toBe('descripción')
    expect(toSnakeCase('descripción')).toBe('descripción')
    expect(toCamelCase('fecha_creación')).toBe('fechaCreación')
    expect(toPascalCase('Über_straße')).toBe('ÜberStraße')
    expect(splitWords('ÁreaTotal')).toEqual(['Área', 'Total'])
  })

  it.each(['order_items', 'created_by', 'HTTP_server', 'line2_item', 'descripción_corta'])(
    'camelCase of the PascalCase form of %s starts lowercase and keeps its words',
    (input) => {
      const camel = toCamelCase(toPascalCase(input))
      expect(camel.charAt(0)).toBe(camel.charAt(0).toLowerCase())
      expect(splitWords(camel).map((word) => word.toLowerCase())).toEqual(
        splitWords(input).map((word) => word.toLowerCase()),
      )
    },
  )

  it('returns null, undefined and empty input unchanged', () => {
    expect(toPascalCase(null)).toBeNull()
    expect(toCamelCase(undefined)).toBeUndefined()
    expect(toSnakeCase('')).toBe('')
    expect(toPlural(null)).toBeNull()
    expect(toPropertyName(undefined)).toBeUndefined()
  })
})

describe('toPlural', () => {
  it.each([
    ['category', 'categories'],
    ['day', 'days'],
    ['key', 'keys'],
    ['box', 'boxes'],
    ['address', 'addresses'],
    ['quiz', 'quizes'],
    ['batch', 'batches'],
    ['wish', 'wishes'],
    ['product', 'products'],
    ['Company', 'Companies'],
    ['status', 'statuses'],
    ['user', 'users'],
  ])('%s → %s', (input, expected) => {
    expect(toPlural(input)).toBe(expected)
  })
})

describe('toSingular', () => {
  it.each([
    ['categories', 'category'],
    ['addresses', 'address'],
    ['boxes', 'box'],
    ['batches', 'batch'],
    ['products', 'product'],
    ['status', 'status'],
    ['class', 'class'],
    ['product_tags', 'product_tag'],
  ])('%s → %s', (input, expected) => {
    expect(toSingular(input)).toBe(expected)
  })
})

describe('toPropertyName', () => {
  it('strips a trailing _id case-insensitively', () => {
    expect(toPropertyName('category_id')).toBe('category')
    expect(toPropertyName('Parent_ID')).toBe('Parent')
  })

  it('leaves other names alone', () => {
    expect(toPropertyName('owner')).toBe('owner')
    expect(toPropertyName('id')).toBe('id')
  })

  it('strips a bare _id to an empty name', () => {
    expect(toPropertyName('_id')).toBe('')
  })
})

describe('isAuditField', () => {
  it('matches the fixed audit set case-insensitively', () => {
    expect(isAuditField('id')).toBe(true)
    expect(isAuditField('CREATED_AT')).toBe(true)
    expect(isAuditField('deleted_by')).toBe(true)
    expect(isAuditField('activo')).toBe(true)
  })

  it('treats the base entity soft-delete flag as an audit field', () => {
    expect(isAuditField('active')).toBe(true)
    expect(isAuditField('Active')).toBe(true)
    expect(isAuditField('inactive')).toBe(false)
  })

  it('rejects business columns and empty input', () => {
    expect(isAuditField('name')).toBe(false)
    expect(isAuditField('created')).toBe(false)
    expect(isAuditField(null)).toBe(false)
  })
})

describe('escapeIfKeyword', () => {
  const keywords = new Set(['class', 'type'])

  it('appends an underscore to reserved words', () => {
    expect(escapeIfKeyword('class', keywords)).toBe('class_')
  })

  it('matches exactly', () => {
    expect(escapeIfKeyword('Class', keywords)).toBe('Class')
    expect(escapeIfKeyword('types', keywords)).toBe('types')
  })
})
