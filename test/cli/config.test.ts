/**
 * CLI Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { overridesFromOptions } from '../../src/cli/commands/generate.js'
import { configFromEnv, DEFAULT_OUTPUT, parseConfigFile, resolveConfig } from '../../src/cli/config.js'

describe('configFromEnv', () => {
  it('reads TABLESMITH_* variables and ignores empty ones', () => {
    expect(
      configFromEnv({ TABLESMITH_TARGET: 'go-gin', TABLESMITH_NAMESPACE: '', TABLESMITH_OUTPUT: './out' }),
    ).toEqual({ target: 'go-gin', namespace: undefined, output: './out' })
  })
})

describe('parseConfigFile', () => {
  it('accepts a partial config', () => {
    expect(parseConfigFile({ target: 'rust-axum', features: { mail: true } }, 'tablesmith.config.ts')).toEqual({
      target: 'rust-axum',
      features: { mail: true },
    })
  })

  it('rejects unknown keys', () => {
    expect(() => parseConfigFile({ outputDir: './out' }, 'tablesmith.config.ts')).toThrow(
      "Invalid config in tablesmith.config.ts:\n  - (root): Unrecognized key(s) in object: 'outputDir'",
    )
  })

  it('reports each invalid value with its path', () => {
    expect(() =>
      parseConfigFile({ namespace: '  ', resetTokenMinutes: 0 }, 'tablesmith.config.ts'),
    ).toThrow(
      'Invalid config in tablesmith.config.ts:\n  - namespace: namespace must not be blank\n  - resetTokenMinutes: Number must be greater than 0',
    )
  })
})

describe('resolveConfig', () => {
  const noEnv = {}

  it('fills defaults around the required values', () => {
    const { project, output } = resolveConfig({ target: 'java-spring', namespace: 'com.example.shop' }, {}, noEnv)

    expect(project).toEqual({
      target: 'java-spring',
      namespace: 'com.example.shop',
      projectName: 'app',
      tests: true,
      features: { socialLogin: false, mail: false, fileStorage: false, passwordReset: false },
      socialProviders: ['google', 'github'],
      storageBackend: 'local',
      resetTokenMinutes: 30,
    })
    expect(output).toBe(DEFAULT_OUTPUT)
  })

  it('prefers flags over the config file over the environment', () => {
    const { project, output } = resolveConfig(
      { target: 'go-gin' },
      { target: 'rust-axum', namespace: 'example.com/shop', output: './from-file' },
      { target: 'java-spring', namespace: 'com.env', output: './from-env' },
    )

    expect(project.target).toBe('go-gin')
    expect(project.namespace).toBe('example.com/shop')
    expect(output).toBe('./from-file')
  })

  it('falls through to the environment', () => {
    const { project, output } = resolveConfig({}, {}, configFromEnv({
      TABLESMITH_TARGET: 'python-fastapi',
      TABLESMITH_NAMESPACE: 'shop',
      TABLESMITH_OUTPUT: './env-out',
    }))

    expect(project.target).toBe('python-fastapi')
    expect(project.namespace).toBe('shop')
    expect(output).toBe('./env-out')
  })

  it('merges feature switches per switch', () => {
    const { project } = resolveConfig(
      { namespace: 'shop', features: { mail: undefined, fileStorage: true } },
      { target: 'typescript-nestjs', features: { mail: true, fileStorage: false } },
      noEnv,
    )

    expect(project.features).toEqual({ socialLogin: false, mail: true, fileStorage: true, passwordReset: false })
  })

  it('lets a flag turn tests off over the config file', () => {
    const { project } = resolveConfig({ tests: false }, { target: 'go-gin', namespace: 'shop', tests: true }, noEnv)
    expect(project.tests).toBe(false)
  })

  it('reports a missing or unknown target and a missing namespace', () => {
    expect(() => resolveConfig({ target: 'cobol-cics' }, {}, noEnv)).toThrow(
      'Invalid configuration:\n' +
        '  - target: target must be one of: java-spring, kotlin-spring, typescript-nestjs, python-fastapi, go-gin, rust-axum\n' +
        '  - namespace: Required',
    )
  })

  it('rejects an unknown storage backend from the command line', () => {
    expect(() => resolveConfig({ target: 'go-gin', namespace: 'shop', storageBackend: 'ftp' }, {}, noEnv)).toThrow(
      "  - storageBackend: Invalid enum value. Expected 'local' | 's3' | 'azure', received 'ftp'",
    )
  })
})

describe('overridesFromOptions', () => {
  it('splits providers and parses minutes', () => {
    const overrides = overridesFromOptions({ providers: ' google, facebook ,', resetTokenMinutes: '20', mail: true })

    expect(overrides.socialProviders).toEqual(['google', 'facebook'])
    expect(overrides.resetTokenMinutes).toBe(20)
    expect(overrides.features).toEqual({
      socialLogin: undefined,
      mail: true,
      fileStorage: undefined,
      passwordReset: undefined,
    })
  })

  it('leaves unset flags undefined', () => {
    const overrides = overridesFromOptions({})

    expect(overrides.target).toBeUndefined()
    expect(overrides.socialProviders).toBeUndefined()
    expect(overrides.resetTokenMinutes).toBeUndefined()
  })

  it('rejects a non-numeric token lifetime', () => {
    expect(() => overridesFromOptions({ resetTokenMinutes: 'soon' })).toThrow(
      "--reset-token-minutes expects a number, got 'soon'",
    )
  })
})
