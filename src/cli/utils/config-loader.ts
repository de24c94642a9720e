/**
 * Config Loader
 *
 * Uses jiti to load `tablesmith.config.ts` (or .js/.mjs) at runtime, so
 * users can write the config in TypeScript without a build step.
 */

import { existsSync } from 'fs'
import { resolve } from 'path'
import { createJiti } from 'jiti'
import { parseConfigFile } from '../config.js'
import type { ConfigFile } from '../config.js'

export const CONFIG_FILE_NAMES = ['tablesmith.config.ts', 'tablesmith.config.mjs', 'tablesmith.config.js'] as const

const jiti = createJiti(import.meta.url, {
  interopDefault: true,
})

/**
 * First config file present in `cwd`, if any
 */
export function findConfigFile(cwd: string = process.cwd()): string | undefined {
  return CONFIG_FILE_NAMES.map((name) => resolve(cwd, name)).find((path) => existsSync(path))
}

/**
 * Load and validate a config file. With no explicit path, looks in `cwd` and
 * returns an empty config when nothing is found.
 *
 * @throws Error when an explicit path is missing, fails to load, or does not validate
 */
export async function loadConfigFile(path?: string, cwd: string = process.cwd()): Promise<{ config: ConfigFile; path?: string }> {
  const configPath = path ? resolve(cwd, path) : findConfigFile(cwd)
  if (!configPath) return { config: {} }

  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }

  let loaded: unknown
  try {
    loaded = await jiti.import(configPath, { default: true })
  } catch (error) {
    throw new Error(`Failed to load config ${configPath}: ${error instanceof Error ? error.message : String(error)}`)
  }

  return { config: parseConfigFile(loaded, configPath), path: configPath }
}
