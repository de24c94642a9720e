/**
 * Target Registry Tests
 */

import { describe, it, expect } from 'vitest'
import { describeTargets } from '../../src/cli/commands/targets.js'
import { builtinTargets, defaultRegistry, TargetRegistry } from '../../src/targets/registry.js'
import { TARGET_IDS } from '../../src/targets/target.js'

describe('TargetRegistry', () => {
  it('registers every built-in target in canonical order', () => {
    expect(defaultRegistry.ids()).toEqual([...TARGET_IDS])
  })

  it('pairs each target with its own type mapper', () => {
    for (const profile of defaultRegistry.list()) {
      expect(profile.typeMapper.target).toBe(profile.id)
    }
  })

  it('uses the naming convention of each language', () => {
    expect(defaultRegistry.require('python-fastapi').identifierCase).toBe('snake')
    expect(defaultRegistry.require('go-gin').identifierCase).toBe('pascal')
    expect(defaultRegistry.require('kotlin-spring').identifierCase).toBe('camel')
  })

  it('returns undefined from get for an unknown id', () => {
    expect(defaultRegistry.get('cobol-cics')).toBeUndefined()
  })

  it('fails on an unknown id and lists what is available', () => {
    const registry = new TargetRegistry(builtinTargets().filter((profile) => profile.language === 'go'))

    expect(() => registry.require('elixir-phoenix')).toThrow(
      "Unknown target 'elixir-phoenix'. Available targets: go-gin",
    )
  })

  it('replaces a profile registered twice under the same id', () => {
    const [java] = builtinTargets()
    const registry = new TargetRegistry([java, { ...java, displayName: 'Java 21' }])

    expect(registry.list()).toHaveLength(1)
    expect(registry.require('java-spring').displayName).toBe('Java 21')
  })
})

describe('describeTargets', () => {
  it('lists feature packs per target', () => {
    const lines = describeTargets()

    expect(lines).toHaveLength(6)
    expect(lines[0]).toBe(
      'java-spring        Java / Spring Boot (Spring Boot 3 + JPA); features: social-login, mail, file-storage, password-reset',
    )
    expect(lines[5]).toBe(
      'rust-axum          Rust / Axum (Axum + sqlx); features: social-login, mail, file-storage, password-reset',
    )
  })

  it('carries all four packs on every built-in target', () => {
    for (const profile of defaultRegistry.list()) {
      expect(Object.keys(profile.features).sort()).toEqual(['file-storage', 'mail', 'password-reset', 'social-login'])
    }
  })

  it('says none for a target without packs', () => {
    const [java] = builtinTargets()

    expect(describeTargets(new TargetRegistry([{ ...java, features: {} }]))).toEqual([
      'java-spring        Java / Spring Boot (Spring Boot 3 + JPA); features: none',
    ])
  })
})
