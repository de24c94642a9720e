/**
 * Artifact Generator Tests
 */

import { describe, it, expect } from 'vitest'
import { DiagnosticCollector } from '../../src/core/diagnostics.js'
import { RelationshipResolver } from '../../src/core/relationship-resolver.js'
import { ArtifactGenerator } from '../../src/generators/artifact-generator.js'
import { defaultRegistry } from '../../src/targets/registry.js'
import { column, fk, loadCatalog, mustGet, schemaOf, tableDef } from '../helpers/schema.js'

const BASE = 'src/main/java/com/example/catalog/products'

describe('ArtifactGenerator', () => {
  const catalog = loadCatalog()
  const resolver = new RelationshipResolver(catalog)
  const java = defaultRegistry.require('java-spring')

  function generateProducts(generator: ArtifactGenerator): Map<string, string> {
    const table = mustGet(catalog, 'products')
    const { outgoing, incoming, manyToMany } = resolver.resolve(table)
    return generator.generate(table, outgoing, incoming, manyToMany)
  }

  it('renders one file per artifact kind in kind order', () => {
    const files = generateProducts(new ArtifactGenerator(java, { namespace: 'com.example.catalog' }))

    expect([...files.keys()]).toEqual([
      `${BASE}/domain/entity/Product.java`,
      `${BASE}/application/dto/ProductDTO.java`,
      `${BASE}/infrastructure/repository/ProductRepository.java`,
      `${BASE}/application/service/ProductService.java`,
      `${BASE}/infrastructure/controller/ProductController.java`,
      'src/test/java/com/example/catalog/products/application/service/ProductServiceTest.java',
    ])
  })

  it('renders only the requested kinds', () => {
    const files = generateProducts(new ArtifactGenerator(java, { namespace: 'com.example.catalog', kinds: ['entity'] }))
    expect([...files.keys()]).toEqual([`${BASE}/domain/entity/Product.java`])
  })

  it('renders relations into the entity', () => {
    const files = generateProducts(new ArtifactGenerator(java, { namespace: 'com.example.catalog', kinds: ['entity'] }))
    const lines = (files.get(`${BASE}/domain/entity/Product.java`) ?? '').split('\n')

    expect(lines[0]).toBe('package com.example.catalog.products.domain.entity;')
    expect(lines).toContain('@Table(name = "products", indexes = {')
    expect(lines).toContain('    @Index(name = "idx_products_name", columnList = "name")')
    expect(lines).toContain('    @Column(name = "sku", nullable = false, unique = true, length = 32)')
    expect(lines).toContain('    @JoinColumn(name = "category_id", nullable = false)')
    expect(lines).toContain('    @OneToOne(mappedBy = "product", fetch = FetchType.LAZY)')
    expect(lines).toContain('    private Set<Tag> tags = new HashSet<>();')
  })

  describe('column defaults', () => {
    const schema = schemaOf(
      tableDef('orders', { columns: [column('status', 'String', { nullable: false, defaultValue: "'NEW'" })] }),
    )

    function entitySource(targetId: string): string {
      const generator = new ArtifactGenerator(defaultRegistry.require(targetId), {
        namespace: 'com.example',
        kinds: ['entity'],
      })
      return [...generator.generate(mustGet(schema, 'orders'), [], [], []).values()].join('\n')
    }

    it.each([
      ['java-spring', '    @ColumnDefault("\'NEW\'")\n    @Column(name = "status", nullable = false)\n    private String status;'],
      ['kotlin-spring', '    @ColumnDefault("\'NEW\'")\n    @Column(name = "status", nullable = false)\n    var status: String = ""'],
      ['typescript-nestjs', `  @Column({ name: 'status', default: () => "'NEW'" })`],
      ['python-fastapi', '    status: Mapped[str] = mapped_column("status", server_default=text("\'NEW\'"))'],
      ['go-gin', 'gorm:"column:status;not null;default:NEW"'],
      ['rust-axum', "    /// Database default: `'NEW'`\n    pub status: String,"],
    ])('%s renders the default on the database side', (targetId, expected) => {
      expect(entitySource(targetId)).toContain(expected)
    })

    it('imports what the default annotation needs', () => {
      expect(entitySource('java-spring')).toContain('import org.hibernate.annotations.ColumnDefault;')
      expect(entitySource('python-fastapi')).toContain('from sqlalchemy import text')
    })
  })

  it('types reference ids from the foreign-key column', () => {
    const schema = schemaOf(
      tableDef('accounts'),
      tableDef('sessions', { columns: [column('account_id', 'UUID')], foreignKeys: [fk('account_id', 'accounts')] }),
    )
    const table = mustGet(schema, 'sessions')
    const { outgoing, incoming, manyToMany } = new RelationshipResolver(schema).resolve(table)

    const javaDto = new ArtifactGenerator(java, { namespace: 'com.example', kinds: ['dto'] })
      .generate(table, outgoing, incoming, manyToMany)
      .get('src/main/java/com/example/sessions/application/dto/SessionDTO.java')
    expect(javaDto).toContain('        @Nullable UUID accountId')
    expect(javaDto).toContain('import java.util.UUID;')

    const python = new ArtifactGenerator(defaultRegistry.require('python-fastapi'), {
      namespace: 'app',
      kinds: ['entity', 'dto'],
    }).generate(table, outgoing, incoming, manyToMany)
    expect(python.get('app/models/session.py')).toContain(
      '    account_id: Mapped[UUID | None] = mapped_column("account_id", ForeignKey("accounts.id"))',
    )
    expect(python.get('app/schemas/session.py')).toContain('    account_id: UUID | None = None')
  })

  it('uses an explicit type mapper when one is passed', () => {
    const diagnostics = new DiagnosticCollector()
    const schema = schemaOf(tableDef('stores', { columns: [column('location', 'Geometry')] }))
    const table = mustGet(schema, 'stores')
    const generator = new ArtifactGenerator(java, { namespace: 'com.example', kinds: ['entity'], diagnostics })

    const files = generator.generate(table, [], [], [], defaultRegistry.require('kotlin-spring').typeMapper)

    expect([...files.values()][0]).toContain('    private Any location;')
    expect(diagnostics.list().map((d) => d.message)).toEqual(["No kotlin-spring mapping for 'Geometry'; using Any"])
  })
})
