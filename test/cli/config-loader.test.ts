/**
 * Config Loader Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { findConfigFile, loadConfigFile } from '../../src/cli/utils/config-loader.js'

describe('loadConfigFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tablesmith-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns an empty config when no file is present', async () => {
    expect(findConfigFile(dir)).toBeUndefined()
    await expect(loadConfigFile(undefined, dir)).resolves.toEqual({ config: {} })
  })

  it('finds and loads a config file in the working directory', async () => {
    const path = join(dir, 'tablesmith.config.mjs')
    writeFileSync(path, "export default { target: 'go-gin', namespace: 'example.com/shop' }\n")

    expect(findConfigFile(dir)).toBe(path)
    await expect(loadConfigFile(undefined, dir)).resolves.toEqual({
      config: { target: 'go-gin', namespace: 'example.com/shop' },
      path,
    })
  })

  it('fails on an explicit path that does not exist', async () => {
    await expect(loadConfigFile('missing.config.ts', dir)).rejects.toThrow(
      `Config file not found: ${join(dir, 'missing.config.ts')}`,
    )
  })

  it('validates what the file exports', async () => {
    writeFileSync(join(dir, 'tablesmith.config.mjs'), "export default { target: 'cobol-cics' }\n")
    await expect(loadConfigFile(undefined, dir)).rejects.toThrow('Invalid config in')
  })
})
