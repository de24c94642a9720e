/**
 * RelationshipResolver Tests
 */

import { describe, it, expect } from 'vitest'
import { RelationshipResolver } from '../../src/core/relationship-resolver.js'
import { column, fk, loadCatalog, mustGet, schemaOf, tableDef } from '../helpers/schema.js'

describe('RelationshipResolver', () => {
  const schema = loadCatalog()
  const resolver = new RelationshipResolver(schema)

  describe('outgoing', () => {
    it('indexes resolved foreign keys by source table', () => {
      const bySource = resolver.relationshipsBySource()

      expect([...bySource.keys()]).toEqual(['categories', 'products', 'product_details', 'product_tags'])
      expect(resolver.outgoing(mustGet(schema, 'products')).map((r) => r.targetTable.name)).toEqual(['categories'])
    })

    it('returns an empty list for a table without foreign keys', () => {
      expect(resolver.outgoing(mustGet(schema, 'tags'))).toEqual([])
    })

    it('classifies a unique foreign key as ONE_TO_ONE', () => {
      const [relationship] = resolver.outgoing(mustGet(schema, 'product_details'))
      expect(relationship.relationType).toBe('ONE_TO_ONE')
    })

    it('resolves a self reference', () => {
      const [relationship] = resolver.outgoing(mustGet(schema, 'categories'))
      expect(relationship.sourceTable.name).toBe('categories')
      expect(relationship.targetTable.name).toBe('categories')
    })
  })

  describe('inverseRelationships', () => {
    it('matches the referenced table case-insensitively', () => {
      const incoming = resolver.inverseRelationships(mustGet(schema, 'categories'))
      expect(incoming.map((r) => `${r.sourceTable.name}.${r.foreignKey.columnName}`)).toEqual([
        'categories.parent_id',
        'products.category_id',
      ])
    })

    it('excludes relations owned by junction tables', () => {
      const incoming = resolver.inverseRelationships(mustGet(schema, 'products'))
      expect(incoming.map((r) => r.sourceTable.name)).toEqual(['product_details'])
    })
  })

  describe('manyToMany', () => {
    it('produces one relation per side of a junction table', () => {
      expect(resolver.manyToMany(mustGet(schema, 'products'))).toEqual([
        {
          junctionTable: 'product_tags',
          sourceColumn: 'product_id',
          targetColumn: 'tag_id',
          otherTable: mustGet(schema, 'tags'),
        },
      ])
      expect(resolver.manyToMany(mustGet(schema, 'tags'))).toEqual([
        {
          junctionTable: 'product_tags',
          sourceColumn: 'tag_id',
          targetColumn: 'product_id',
          otherTable: mustGet(schema, 'products'),
        },
      ])
    })

    it('treats the first foreign key as this side on a self-referencing junction', () => {
      const selfSchema = schemaOf(
        tableDef('users'),
        tableDef('friendships', {
          columns: [column('user_id', 'Long'), column('friend_id', 'Long')],
          foreignKeys: [fk('user_id', 'users'), fk('friend_id', 'users')],
          primaryKey: ['user_id', 'friend_id'],
          junction: true,
        }),
      )
      const relations = new RelationshipResolver(selfSchema).manyToMany(mustGet(selfSchema, 'users'))

      expect(relations).toHaveLength(1)
      expect(relations[0].sourceColumn).toBe('user_id')
      expect(relations[0].targetColumn).toBe('friend_id')
    })

    it('ignores junction tables without exactly two foreign keys', () => {
      const arity = schemaOf(
        tableDef('a'),
        tableDef('b'),
        tableDef('c'),
        tableDef('abc', {
          columns: [column('a_id', 'Long'), column('b_id', 'Long'), column('c_id', 'Long')],
          foreignKeys: [fk('a_id', 'a'), fk('b_id', 'b'), fk('c_id', 'c')],
          junction: true,
        }),
      )
      expect(new RelationshipResolver(arity).manyToMany(mustGet(arity, 'a'))).toEqual([])
    })

    it('yields no relation from a junction table with one foreign key', () => {
      const single = schemaOf(
        tableDef('orders'),
        tableDef('order_links', {
          columns: [column('order_id', 'Long')],
          foreignKeys: [fk('order_id', 'orders')],
          junction: true,
        }),
      )
      expect(new RelationshipResolver(single).manyToMany(mustGet(single, 'orders'))).toEqual([])
    })
  })

  it('resolves categories, products and tags joined through product_tags', () => {
    const shop = schemaOf(
      tableDef('categories', { columns: [column('name', 'String')] }),
      tableDef('products', {
        columns: [column('name', 'String'), column('category_id', 'Long')],
        foreignKeys: [fk('category_id', 'categories')],
      }),
      tableDef('tags', { columns: [column('label', 'String')] }),
      tableDef('product_tags', {
        columns: [column('product_id', 'Long'), column('tag_id', 'Long')],
        foreignKeys: [fk('product_id', 'products'), fk('tag_id', 'tags')],
        primaryKey: ['product_id', 'tag_id'],
        junction: true,
      }),
    )
    const shopResolver = new RelationshipResolver(shop)
    const summary = (table: string) => {
      const resolved = shopResolver.resolve(mustGet(shop, table))
      return {
        outgoing: resolved.outgoing.map((r) => `${r.foreignKey.columnName}->${r.targetTable.name}:${r.relationType}`),
        incoming: resolved.incoming.map((r) => `${r.sourceTable.name}.${r.foreignKey.columnName}`),
        manyToMany: resolved.manyToMany.map((r) => `${r.junctionTable}->${r.otherTable.name}`),
      }
    }

    expect(summary('categories')).toEqual({ outgoing: [], incoming: ['products.category_id'], manyToMany: [] })
    expect(summary('products')).toEqual({
      outgoing: ['category_id->categories:MANY_TO_ONE'],
      incoming: [],
      manyToMany: ['product_tags->tags'],
    })
    expect(summary('tags')).toEqual({ outgoing: [], incoming: [], manyToMany: ['product_tags->products'] })
    expect(shop.entityTables().map((table) => table.name)).toEqual(['categories', 'products', 'tags'])
    expect(shopResolver.diagnostics()).toEqual([])
  })

  it('resolves all three relation kinds at once', () => {
    const resolved = resolver.resolve(mustGet(schema, 'products'))

    expect(resolved.outgoing).toHaveLength(1)
    expect(resolved.incoming).toHaveLength(1)
    expect(resolved.manyToMany).toHaveLength(1)
  })

  it('is deterministic across instances', () => {
    const other = new RelationshipResolver(schema)
    const table = mustGet(schema, 'categories')
    expect(other.resolve(table)).toEqual(resolver.resolve(table))
  })

  describe('diagnostics', () => {
    it('reports nothing for the catalog fixture', () => {
      expect(resolver.diagnostics()).toEqual([])
    })

    it('reports each relation it had to drop', () => {
      const broken = schemaOf(
        tableDef('orders', { columns: [column('coupon_id', 'Long')], foreignKeys: [fk('coupon_id', 'coupons')] }),
        tableDef('order_tags', {
          columns: [column('order_id', 'Long'), column('tag_id', 'Long')],
          foreignKeys: [fk('order_id', 'orders'), fk('tag_id', 'tags')],
          junction: true,
        }),
        tableDef('lonely_links', {
          columns: [column('order_id', 'Long')],
          foreignKeys: [fk('order_id', 'orders')],
          junction: true,
        }),
      )

      expect(new RelationshipResolver(broken).diagnostics().map((d) => [d.code, d.table, d.column])).toEqual([
        ['dangling-foreign-key', 'orders', 'coupon_id'],
        ['unmatched-junction', 'order_tags', 'tag_id'],
        ['junction-arity', 'lonely_links', undefined],
      ])
    })
  })
})
