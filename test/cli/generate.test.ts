/**
 * Generate Command Tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { runGenerate } from '../../src/cli/commands/generate.js'
import { fixturePath } from '../helpers/schema.js'

describe('runGenerate', () => {
  let output: string

  beforeEach(() => {
    output = mkdtempSync(join(tmpdir(), 'tablesmith-out-'))
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(output, { recursive: true, force: true })
  })

  it('writes every generated file under the output directory', async () => {
    const summary = await runGenerate(fixturePath('catalog-schema.json'), {
      target: 'python-fastapi',
      namespace: 'app',
      output,
    })

    expect(summary.output).toBe(output)
    expect(summary.stats.entities).toBe(4)
    expect(summary.written).toHaveLength(summary.stats.files)
    expect(summary.written).toContain('app/models/product.py')
    expect(readFileSync(join(output, 'app/models/product.py'), 'utf8')).toContain('class Product(AuditMixin, Base):')
  })

  it('writes nothing on a dry run', async () => {
    const summary = await runGenerate(fixturePath('catalog-schema.json'), {
      target: 'go-gin',
      namespace: 'example.com/catalog',
      output,
      tests: false,
      dryRun: true,
    })

    expect(summary.written).toContain('internal/models/product.go')
    expect(summary.written.some((path) => path.endsWith('_test.go'))).toBe(false)
    expect(existsSync(join(output, 'internal'))).toBe(false)
  })

  it('adds the requested feature pack files', async () => {
    const summary = await runGenerate(fixturePath('catalog-schema.json'), {
      target: 'rust-axum',
      namespace: 'catalog',
      output,
      passwordReset: true,
      dryRun: true,
    })

    expect(summary.diagnostics).toEqual([])
    expect(summary.written).toContain('src/password_reset.rs')
    expect(summary.written).toContain('migrations/password_reset_tokens.sql')
  })

  it('fails before loading the schema on an invalid configuration', async () => {
    await expect(runGenerate(fixturePath('catalog-schema.json'), { target: 'go-gin' })).rejects.toThrow(
      '  - namespace: Required',
    )
  })
})
