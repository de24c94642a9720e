/**
 * SchemaModel Tests
 */

import { describe, it, expect } from 'vitest'
import {
  deriveEntityName,
  deriveModuleName,
  foreignKeyFieldName,
  GLOBAL_FUNCTIONS_KEY,
  inferRelationType,
  isAuditTable,
  SchemaModel,
} from '../../src/core/schema-model.js'
import { column, fk, loadCatalog, mustGet, schemaOf, tableDef } from '../helpers/schema.js'

describe('derived names', () => {
  it('derives entity and module names from the table name', () => {
    expect(deriveEntityName('order_items')).toBe('OrderItem')
    expect(deriveEntityName('categories')).toBe('Category')
    expect(deriveModuleName('order_items')).toBe('orderitems')
    expect(deriveModuleName('Order-Items')).toBe('orderitems')
  })

  it('keeps accented letters in entity names', () => {
    expect(deriveEntityName('categorías')).toBe('Categoría')
    expect(deriveEntityName('año_fiscal')).toBe('AñoFiscal')
  })

  it('is a pure function of the name', () => {
    const first = schemaOf(tableDef('order_items')).tables[0]
    const second = schemaOf(tableDef('customers'), tableDef('order_items')).tables[1]

    expect(second.entityName).toBe(first.entityName)
    expect(second.moduleName).toBe(first.moduleName)
    expect(second.variableName).toBe('orderItem')
  })

  it('derives navigation names from foreign keys', () => {
    expect(foreignKeyFieldName(fk('parent_category_id', 'categories'))).toBe('parentCategory')
    expect(foreignKeyFieldName(fk('owner', 'users', { fieldName: 'createdBy' }))).toBe('createdBy')
  })
})

describe('inferRelationType', () => {
  it('is ONE_TO_ONE for a unique foreign-key column', () => {
    const definition = tableDef('profiles', {
      columns: [column('user_id', 'Long', { unique: true })],
      foreignKeys: [fk('user_id', 'users')],
    })
    expect(inferRelationType(definition, definition.foreignKeys[0])).toBe('ONE_TO_ONE')
  })

  it('is ONE_TO_ONE for a single-column unique index', () => {
    const definition = tableDef('profiles', {
      columns: [column('user_id', 'Long')],
      foreignKeys: [fk('user_id', 'users')],
      indexes: [{ columns: ['USER_ID'], unique: true }],
    })
    expect(inferRelationType(definition, definition.foreignKeys[0])).toBe('ONE_TO_ONE')
  })

  it('is MANY_TO_ONE otherwise', () => {
    const definition = tableDef('orders', {
      columns: [column('customer_id', 'Long'), column('region', 'String')],
      foreignKeys: [fk('customer_id', 'customers')],
      indexes: [{ columns: ['customer_id', 'region'], unique: true }],
    })
    expect(inferRelationType(definition, definition.foreignKeys[0])).toBe('MANY_TO_ONE')
  })
})

describe('SchemaModel', () => {
  it('looks up tables case-insensitively', () => {
    const schema = loadCatalog()
    expect(schema.getTable('PRODUCTS')?.name).toBe('products')
    expect(schema.getTable('missing')).toBeUndefined()
  })

  it('keeps the first table on a case-insensitive name clash', () => {
    const schema = schemaOf(tableDef('Tags', { comment: 'first' }), tableDef('tags', { comment: 'second' }))
    expect(schema.getTable('tags')?.comment).toBe('first')
  })

  it('separates entity, junction and audit tables', () => {
    const schema = loadCatalog()

    expect(schema.entityTables().map((table) => table.name)).toEqual([
      'categories',
      'products',
      'product_details',
      'tags',
    ])
    expect(schema.junctionTables().map((table) => table.name)).toEqual(['product_tags'])
    expect(isAuditTable({ name: 'products_aud' })).toBe(true)
    expect(isAuditTable({ name: 'REVINFO' })).toBe(true)
    expect(isAuditTable({ name: 'audits' })).toBe(false)
  })

  it('excludes primary key and audit fields from business columns', () => {
    const schema = loadCatalog()
    const names = schema.businessColumns(mustGet(schema, 'products')).map((c) => c.name)

    expect(names).toEqual(['sku', 'name', 'price', 'released_on', 'category_id'])
  })

  it('omits dangling foreign keys from allRelationships', () => {
    const schema = schemaOf(
      tableDef('orders', {
        columns: [column('customer_id', 'Long'), column('coupon_id', 'Long')],
        foreignKeys: [fk('customer_id', 'customers'), fk('coupon_id', 'coupons')],
      }),
      tableDef('customers'),
    )

    const relationships = schema.allRelationships()
    expect(relationships).toHaveLength(1)
    expect(relationships[0].targetTable.name).toBe('customers')
    expect(relationships[0].relationType).toBe('MANY_TO_ONE')
  })

  it('groups functions by the table they mention', () => {
    const schema = new SchemaModel({
      tables: [tableDef('products'), tableDef('orders')],
      functions: [
        { name: 'fn_product_stock', parameters: [] },
        { name: 'close_order', parameters: [] },
        { name: 'refresh_stats', parameters: [] },
      ],
    })

    const grouped = schema.functionsByTable()
    expect(grouped.get('products')?.map((fn) => fn.name)).toEqual(['fn_product_stock'])
    expect(grouped.get('orders')?.map((fn) => fn.name)).toEqual(['close_order'])
    expect(grouped.get(GLOBAL_FUNCTIONS_KEY)?.map((fn) => fn.name)).toEqual(['refresh_stats'])
  })

  it('names the schema "schema" when the document has no name', () => {
    expect(new SchemaModel({ tables: [] }).name).toBe('schema')
  })
})

describe('validate', () => {
  it('accepts the catalog fixture', () => {
    expect(loadCatalog().validate()).toEqual([])
  })

  it('reports missing primary keys, unknown references and duplicate entities', () => {
    const schema = schemaOf(
      { ...tableDef('logs'), columns: [column('message', 'String')], primaryKey: [] },
      tableDef('orders', { columns: [column('coupon_id', 'Long')], foreignKeys: [fk('coupon_id', 'coupons')] }),
      tableDef('order'),
    )

    expect(schema.validate()).toEqual([
      "Table 'logs' has no primary key",
      "Table 'orders' column 'coupon_id' references unknown table 'coupons'",
      "Tables 'orders' and 'order' both map to entity 'Order'",
    ])
  })
})
