/**
 * Project Assembler Tests
 *
 * End-to-end runs over the catalog fixture.
 */

import { describe, it, expect } from 'vitest'
import { assemble, DEFAULT_PROJECT_CONFIG, enabledFeatures } from '../../src/generators/project-assembler.js'
import type { ProjectConfig } from '../../src/generators/project-assembler.js'
import { builtinTargets, TargetRegistry } from '../../src/targets/registry.js'
import { TARGET_IDS } from '../../src/targets/target.js'
import { loadCatalog } from '../helpers/schema.js'

const JAVA_ROOT = 'src/main/java/com/example/catalog'

function config(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    ...DEFAULT_PROJECT_CONFIG,
    target: 'java-spring',
    namespace: 'com.example.catalog',
    projectName: 'catalog',
    ...overrides,
  }
}

describe('enabledFeatures', () => {
  it('lists switched-on packs in canonical order', () => {
    expect(enabledFeatures({ socialLogin: false, mail: true, fileStorage: false, passwordReset: true })).toEqual([
      'mail',
      'password-reset',
    ])
    expect(enabledFeatures(DEFAULT_PROJECT_CONFIG.features)).toEqual([])
  })
})

describe('assemble', () => {
  const catalog = loadCatalog()

  it('renders shared files first, then every entity table', () => {
    const result = assemble(catalog, config())
    const paths = [...result.files.keys()]

    expect(paths.slice(0, 3)).toEqual([
      `${JAVA_ROOT}/common/domain/BaseEntity.java`,
      `${JAVA_ROOT}/CatalogApplication.java`,
      `${JAVA_ROOT}/categories/domain/entity/Category.java`,
    ])
    expect(paths.filter((path) => path.includes('/domain/entity/'))).toEqual([
      `${JAVA_ROOT}/categories/domain/entity/Category.java`,
      `${JAVA_ROOT}/products/domain/entity/Product.java`,
      `${JAVA_ROOT}/productdetails/domain/entity/ProductDetail.java`,
      `${JAVA_ROOT}/tags/domain/entity/Tag.java`,
    ])
    expect(result.stats).toEqual({ entities: 4, junctionTables: 1, files: 26 })
    expect(result.diagnostics).toEqual([])
  })

  it('never renders junction or audit tables as entities', () => {
    const paths = [...assemble(catalog, config()).files.keys()]

    expect(paths.some((path) => path.toLowerCase().includes('producttag'))).toBe(false)
    expect(paths.some((path) => path.toLowerCase().includes('aud'))).toBe(false)
  })

  it('leaves test artifacts out when tests are disabled', () => {
    const result = assemble(catalog, config({ tests: false }))

    expect(result.stats.files).toBe(22)
    expect([...result.files.keys()].some((path) => path.startsWith('src/test/'))).toBe(false)
  })

  it('produces identical output for identical input', () => {
    const first = assemble(catalog, config({ target: 'python-fastapi', namespace: 'app' }))
    const second = assemble(loadCatalog(), config({ target: 'python-fastapi', namespace: 'app' }))

    expect([...second.files.entries()]).toEqual([...first.files.entries()])
  })

  it.each(TARGET_IDS.map((id) => [id]))('renders the catalog for %s', (target) => {
    const result = assemble(catalog, config({ target }))

    expect(result.stats.entities).toBe(4)
    expect(result.files.size).toBeGreaterThan(4 * 5)
    expect([...result.files.values()].every((content) => content.endsWith('\n'))).toBe(true)
  })

  it('appends feature pack files after the entities', () => {
    const result = assemble(
      catalog,
      config({
        features: { socialLogin: false, mail: false, fileStorage: true, passwordReset: true },
        storageBackend: 'azure',
        resetTokenMinutes: 15,
      }),
    )
    const paths = [...result.files.keys()]

    expect(paths).toContain(`${JAVA_ROOT}/storage/AzureBlobStorageService.java`)
    expect(paths.at(-1)).toBe(`${JAVA_ROOT}/security/reset/PasswordResetController.java`)
    expect(result.files.get(`${JAVA_ROOT}/security/reset/PasswordResetService.java`)).toContain(
      '    static final Duration TOKEN_LIFETIME = Duration.ofMinutes(15);',
    )
    expect(result.diagnostics).toEqual([])
  })

  it('reports feature packs the target cannot render', () => {
    const registry = new TargetRegistry(
      builtinTargets().map((profile) => (profile.id === 'kotlin-spring' ? { ...profile, features: {} } : profile)),
    )
    const result = assemble(
      catalog,
      config({ target: 'kotlin-spring', features: { socialLogin: false, mail: true, fileStorage: false, passwordReset: false } }),
      { registry },
    )

    expect(result.diagnostics).toEqual([
      {
        code: 'unsupported-feature',
        severity: 'warning',
        message: "Feature 'mail' is not available for Kotlin / Spring Boot",
      },
    ])
    expect(result.stats.files).toBe(assemble(catalog, config({ target: 'kotlin-spring' })).stats.files)
  })

  it('renders the Kotlin mail pack with the shared templates', () => {
    const result = assemble(
      catalog,
      config({ target: 'kotlin-spring', features: { socialLogin: false, mail: true, fileStorage: false, passwordReset: false } }),
    )

    expect(result.diagnostics).toEqual([])
    expect(result.files.has('src/main/kotlin/com/example/catalog/common/mail/MailService.kt')).toBe(true)
    expect(result.files.has('src/main/resources/templates/email/password-reset.html')).toBe(true)
  })

  it('declares Rust feature modules, their crates and their routers', () => {
    const result = assemble(
      catalog,
      config({
        target: 'rust-axum',
        namespace: 'catalog',
        features: { socialLogin: false, mail: false, fileStorage: true, passwordReset: true },
      }),
    )
    const cargo = (result.files.get('Cargo.toml') ?? '').split('\n')
    const main = (result.files.get('src/main.rs') ?? '').split('\n')

    expect(result.files.get('src/lib.rs')).toBe(
      'pub mod models;\npub mod dto;\npub mod repository;\npub mod service;\npub mod handlers;\npub mod error;\npub mod storage;\npub mod password_reset;\n',
    )
    expect(cargo.slice(cargo.indexOf('[dependencies]') + 1).map((line) => line.split(' = ')[0])).toEqual([
      'anyhow',
      'axum',
      'chrono',
      'hex',
      'object_store',
      'rand',
      'rust_decimal',
      'serde',
      'serde_json',
      'sqlx',
      'thiserror',
      'tokio',
      'uuid',
      'validator',
      '',
    ])
    expect(main).toContain('        .merge(app::storage::router()?)')
    expect(main).toContain('        .merge(app::password_reset::router(pool.clone()));')
    expect(result.files.has('src/storage.rs')).toBe(true)
    expect(result.diagnostics).toEqual([])
  })

  it('leaves Rust feature modules out when no pack is requested', () => {
    const result = assemble(catalog, config({ target: 'rust-axum', namespace: 'catalog' }))

    expect(result.files.get('src/lib.rs')).toBe(
      'pub mod models;\npub mod dto;\npub mod repository;\npub mod service;\npub mod handlers;\npub mod error;\n',
    )
    expect(result.files.get('Cargo.toml')).not.toContain('object_store')
  })

  it('fails on an unknown target', () => {
    expect(() => assemble(catalog, config({ target: 'cobol-cics' }))).toThrow("Unknown target 'cobol-cics'")
  })

  it('looks targets up in the registry it is given', () => {
    const registry = new TargetRegistry(builtinTargets().filter((profile) => profile.id === 'go-gin'))

    expect(() => assemble(catalog, config(), { registry })).toThrow(
      "Unknown target 'java-spring'. Available targets: go-gin",
    )
    expect(assemble(catalog, config({ target: 'go-gin' }), { registry }).stats.entities).toBe(4)
  })
})
