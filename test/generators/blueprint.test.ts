/**
 * Entity Blueprint Tests
 */

import { describe, it, expect } from 'vitest'
import { DiagnosticCollector } from '../../src/core/diagnostics.js'
import { RelationshipResolver } from '../../src/core/relationship-resolver.js'
import type { SchemaModel } from '../../src/core/schema-model.js'
import { buildBlueprint, defaultIndexName, entityRef, recase } from '../../src/generators/blueprint.js'
import type { BlueprintContext } from '../../src/generators/blueprint.js'
import { javaTypeMapper } from '../../src/targets/java-spring/type-mapper.js'
import { pythonTypeMapper } from '../../src/targets/python-fastapi/type-mapper.js'
import type { TypeMapper } from '../../src/targets/type-mapper.js'
import { column, fk, loadCatalog, mustGet, schemaOf, tableDef } from '../helpers/schema.js'

const JAVA: BlueprintContext = { namespace: 'com.example.catalog', identifierCase: 'camel' }

function blueprintFor(schema: SchemaModel, name: string, mapper: TypeMapper = javaTypeMapper, context = JAVA) {
  const table = mustGet(schema, name)
  return buildBlueprint(table, new RelationshipResolver(schema).resolve(table), mapper, context)
}

describe('helpers', () => {
  it('spells an entity every way a renderer needs', () => {
    expect(entityRef(mustGet(loadCatalog(), 'product_details'))).toEqual({
      tableName: 'product_details',
      entityName: 'ProductDetail',
      variableName: 'productDetail',
      pluralName: 'productDetails',
      moduleName: 'productdetails',
      kebabName: 'product-detail',
      snakeName: 'product_detail',
    })
  })

  it('recases identifiers', () => {
    expect(recase('released_on', 'camel')).toBe('releasedOn')
    expect(recase('released_on', 'pascal')).toBe('ReleasedOn')
    expect(recase('productDetail', 'snake')).toBe('product_detail')
  })

  it('names indexes after table and columns', () => {
    expect(defaultIndexName('products', ['name'], false)).toBe('idx_products_name')
    expect(defaultIndexName('Orders', ['Customer_Id', 'region'], true)).toBe('uk_orders_customer_id_region')
  })
})

describe('buildBlueprint', () => {
  const catalog = loadCatalog()

  it('maps business columns to scalar fields, leaving resolved foreign keys out', () => {
    const blueprint = blueprintFor(catalog, 'products')

    expect(blueprint.fields.map((field) => [field.name, field.type])).toEqual([
      ['sku', 'String'],
      ['name', 'String'],
      ['price', 'BigDecimal'],
      ['releasedOn', '@Nullable LocalDate'],
    ])
    expect(blueprint.fields[0]).toMatchObject({ columnName: 'sku', unique: true, length: 32, zeroValue: '""' })
    expect(blueprint.fields[2]).toMatchObject({ precision: 10, scale: 2, zeroValue: 'BigDecimal.ZERO' })
  })

  it('collects imports in first-use order', () => {
    expect(blueprintFor(catalog, 'products').imports).toEqual([
      'java.math.BigDecimal',
      'java.time.LocalDate',
      'org.jspecify.annotations.Nullable',
    ])
  })

  it('turns an outgoing foreign key into a reference', () => {
    const [reference] = blueprintFor(catalog, 'products').references

    expect(reference).toEqual({
      kind: 'many-to-one',
      name: 'category',
      idName: 'categoryId',
      idType: 'long',
      columnName: 'category_id',
      referencedColumn: 'id',
      target: entityRef(mustGet(catalog, 'categories')),
      nullable: false,
      unique: false,
      onDelete: 'RESTRICT',
    })
  })

  it('marks a unique foreign key as one-to-one', () => {
    const [reference] = blueprintFor(catalog, 'product_details').references
    expect(reference.kind).toBe('one-to-one')
    expect(reference.name).toBe('product')
  })

  it('maps incoming many-to-one relations to collections', () => {
    const blueprint = blueprintFor(catalog, 'categories')

    expect(blueprint.collections.map((c) => [c.name, c.type, c.mappedBy, c.foreignKeyColumn])).toEqual([
      ['categories', 'Set<Category>', 'parent', 'parent_id'],
      ['products', 'Set<Product>', 'category', 'category_id'],
    ])
    expect(blueprint.references.map((r) => r.name)).toEqual(['parent'])
  })

  it('maps an incoming one-to-one relation to a back reference', () => {
    const blueprint = blueprintFor(catalog, 'products')

    expect(blueprint.collections).toEqual([])
    expect(blueprint.backReferences).toEqual([
      {
        name: 'productDetail',
        source: entityRef(mustGet(catalog, 'product_details')),
        mappedBy: 'product',
        foreignKeyColumn: 'product_id',
      },
    ])
  })

  it('maps junction tables to join collections', () => {
    expect(blueprintFor(catalog, 'tags').joins).toEqual([
      {
        name: 'products',
        type: 'Set<Product>',
        element: entityRef(mustGet(catalog, 'products')),
        joinTable: 'product_tags',
        joinColumn: 'tag_id',
        inverseJoinColumn: 'product_id',
      },
    ])
  })

  it('names unnamed indexes', () => {
    expect(blueprintFor(catalog, 'products').indexes).toEqual([
      { name: 'idx_products_name', columns: ['name'], unique: false },
    ])
  })

  it('carries table metadata', () => {
    const blueprint = blueprintFor(catalog, 'categories')

    expect(blueprint.namespace).toBe('com.example.catalog')
    expect(blueprint.comment).toBe('Product categories')
    expect(blueprint.primaryKeyType).toBe('Long')
    expect(blueprint.fields.map((field) => field.name)).toEqual(['name'])
  })

  it('uses snake_case identifiers for snake targets', () => {
    const blueprint = blueprintFor(catalog, 'products', pythonTypeMapper, {
      namespace: 'app',
      identifierCase: 'snake',
    })

    expect(blueprint.fields.map((field) => field.name)).toEqual(['sku', 'name', 'price', 'released_on'])
    expect(blueprint.references[0].idName).toBe('category_id')
    expect(blueprint.backReferences[0].name).toBe('product_detail')
  })

  it('escapes reserved words', () => {
    const schema = schemaOf(tableDef('lessons', { columns: [column('class', 'String')] }))
    expect(blueprintFor(schema, 'lessons').fields[0].name).toBe('class_')
  })

  it('qualifies a member whose name is already taken', () => {
    const schema = schemaOf(
      tableDef('categories'),
      tableDef('products', {
        columns: [column('category', 'String'), column('category_id', 'Long')],
        foreignKeys: [fk('category_id', 'categories')],
      }),
    )
    const blueprint = blueprintFor(schema, 'products')

    expect(blueprint.fields.map((field) => field.name)).toEqual(['category'])
    expect(blueprint.references.map((reference) => reference.name)).toEqual(['refCategory'])
  })

  it('numbers a member when its qualified name is taken too', () => {
    const schema = schemaOf(
      tableDef('categories'),
      tableDef('products', {
        columns: [column('category', 'String'), column('ref_category', 'String'), column('category_id', 'Long')],
        foreignKeys: [fk('category_id', 'categories')],
      }),
    )
    const blueprint = blueprintFor(schema, 'products')
    const names = [...blueprint.fields.map((field) => field.name), ...blueprint.references.map((ref) => ref.name)]

    expect(names).toEqual(['category', 'refCategory', 'refCategory2'])
    expect(new Set(names).size).toBe(names.length)
  })

  it('numbers colliding members in snake case too', () => {
    const schema = schemaOf(
      tableDef('categories'),
      tableDef('products', {
        columns: [column('category', 'String'), column('ref_category', 'String'), column('category_id', 'Long')],
        foreignKeys: [fk('category_id', 'categories')],
      }),
    )
    const blueprint = blueprintFor(schema, 'products', pythonTypeMapper, { namespace: 'app', identifierCase: 'snake' })

    expect(blueprint.references.map((ref) => ref.name)).toEqual(['ref_category_2'])
  })

  it('maps the reference id type from the foreign-key column and collects its imports', () => {
    const schema = schemaOf(
      tableDef('accounts'),
      tableDef('sessions', { columns: [column('account_id', 'UUID')], foreignKeys: [fk('account_id', 'accounts')] }),
    )

    const java = blueprintFor(schema, 'sessions')
    expect(java.references[0].idType).toBe('@Nullable UUID')
    expect(java.imports).toEqual(['java.util.UUID', 'org.jspecify.annotations.Nullable'])

    const python = blueprintFor(schema, 'sessions', pythonTypeMapper, { namespace: 'app', identifierCase: 'snake' })
    expect(python.references[0].idType).toBe('UUID | None')
    expect(python.imports).toEqual(['from uuid import UUID'])
  })

  it('carries the column default', () => {
    const schema = schemaOf(
      tableDef('orders', { columns: [column('status', 'String', { nullable: false, defaultValue: "'NEW'" })] }),
    )
    expect(blueprintFor(schema, 'orders').fields[0]).toMatchObject({ columnDefault: "'NEW'", zeroValue: '""' })
  })

  it('keeps a dangling foreign key as a scalar field', () => {
    const schema = schemaOf(
      tableDef('orders', { columns: [column('coupon_id', 'Long')], foreignKeys: [fk('coupon_id', 'coupons')] }),
    )
    const blueprint = blueprintFor(schema, 'orders')

    expect(blueprint.references).toEqual([])
    expect(blueprint.fields.map((field) => [field.name, field.type])).toEqual([['couponId', 'Long']])
  })

  it('reports unmapped types and uses the fallback', () => {
    const diagnostics = new DiagnosticCollector()
    const schema = schemaOf(tableDef('stores', { columns: [column('location', 'Geometry')] }))
    const blueprint = blueprintFor(schema, 'stores', javaTypeMapper, { ...JAVA, diagnostics })

    expect(blueprint.fields[0].type).toBe('Object')
    expect(diagnostics.list()).toEqual([
      {
        code: 'unmapped-type',
        severity: 'warning',
        message: "No java-spring mapping for 'Geometry'; using Object",
        table: 'stores',
        column: 'location',
      },
    ])
  })

  it('describes stored procedures attributed to the table', () => {
    const blueprint = blueprintFor(catalog, 'products', javaTypeMapper, {
      ...JAVA,
      procedures: catalog.functions,
    })

    expect(blueprint.procedures).toEqual([
      {
        name: 'fn_product_stock',
        methodName: 'fnProductStock',
        parameters: [{ name: 'productId', type: 'long' }],
        returnType: 'Integer',
      },
    ])
  })
})
