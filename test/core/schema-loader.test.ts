/**
 * Schema Loader Tests
 */

import { describe, it, expect } from 'vitest'
import { loadSchemaFile, looksLikeJunction, parseSchemaDocument } from '../../src/core/schema-loader.js'
import { fixturePath, fk, mustGet } from '../helpers/schema.js'

describe('parseSchemaDocument', () => {
  it('applies column and foreign-key defaults', () => {
    const schema = parseSchemaDocument({
      tables: [
        {
          name: 'orders',
          columns: [
            { name: 'id', type: 'Long', primaryKey: true },
            { name: 'customer_id', type: 'Long' },
          ],
          foreignKeys: [{ column: 'customer_id', references: 'customers' }],
        },
      ],
    })

    const orders = mustGet(schema, 'orders')
    expect(orders.primaryKey).toEqual(['id'])
    expect(orders.columns[1]).toEqual({
      name: 'customer_id',
      sourceType: 'Long',
      nullable: true,
      unique: false,
      primaryKey: false,
    })
    expect(orders.foreignKeys[0]).toEqual({
      columnName: 'customer_id',
      referencedTable: 'customers',
      referencedColumn: 'id',
    })
    expect(orders.indexes).toEqual([])
    expect(orders.junction).toBe(false)
  })

  it('marks columns listed in an explicit primary key', () => {
    const schema = parseSchemaDocument({
      tables: [
        {
          name: 'product_tags',
          primaryKey: ['product_id', 'tag_id'],
          columns: [
            { name: 'product_id', type: 'Long' },
            { name: 'tag_id', type: 'Long' },
          ],
          foreignKeys: [
            { column: 'product_id', references: 'products' },
            { column: 'tag_id', references: 'tags' },
          ],
        },
      ],
    })

    const junction = mustGet(schema, 'product_tags')
    expect(junction.columns.every((column) => column.primaryKey)).toBe(true)
    expect(junction.junction).toBe(true)
  })

  it('lets an explicit junction flag override the heuristic', () => {
    const schema = parseSchemaDocument({
      tables: [
        {
          name: 'memberships',
          junction: false,
          primaryKey: ['user_id', 'group_id'],
          columns: [
            { name: 'user_id', type: 'Long' },
            { name: 'group_id', type: 'Long' },
          ],
          foreignKeys: [
            { column: 'user_id', references: 'users' },
            { column: 'group_id', references: 'groups' },
          ],
        },
      ],
    })

    expect(mustGet(schema, 'memberships').junction).toBe(false)
  })

  it('reports every invalid field with its path', () => {
    expect(() =>
      parseSchemaDocument({
        tables: [{ name: 'orders', columns: [{ name: 'id' }], foreignKeys: [{ column: 'x' }] }],
      }),
    ).toThrow(
      'Invalid schema document:\n  - tables.0.columns.0.type: Required\n  - tables.0.foreignKeys.0.references: Required',
    )
  })

  it('rejects a document without tables', () => {
    expect(() => parseSchemaDocument({})).toThrow('  - tables: Required')
  })
})

describe('looksLikeJunction', () => {
  it('requires two foreign keys covering a two-column primary key', () => {
    const foreignKeys = [fk('a_id', 'a'), fk('b_id', 'b')]
    expect(looksLikeJunction({ foreignKeys, primaryKey: ['a_id', 'b_id'] })).toBe(true)
    expect(looksLikeJunction({ foreignKeys, primaryKey: ['id'] })).toBe(false)
    expect(looksLikeJunction({ foreignKeys: [foreignKeys[0]], primaryKey: ['a_id', 'b_id'] })).toBe(false)
    expect(looksLikeJunction({ foreignKeys, primaryKey: ['a_id', 'c_id'] })).toBe(false)
  })
})

describe('loadSchemaFile', () => {
  it('loads the catalog fixture', async () => {
    const schema = await loadSchemaFile(fixturePath('catalog-schema.json'))

    expect(schema.name).toBe('catalog')
    expect(schema.tables).toHaveLength(6)
    expect(schema.functions[0]).toEqual({
      name: 'fn_product_stock',
      returnType: 'Integer',
      parameters: [{ name: 'p_product_id', sourceType: 'Long' }],
    })
  })

  it('wraps read failures', async () => {
    await expect(loadSchemaFile(fixturePath('missing.json'))).rejects.toThrow('Failed to read schema file')
  })

  it('wraps JSON syntax errors', async () => {
    await expect(loadSchemaFile(fixturePath('not-json.txt'))).rejects.toThrow('is not valid JSON')
  })
})
