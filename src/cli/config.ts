/**
 * Project Configuration
 *
 * `tablesmith.config.ts` shape and the precedence rules that combine it with
 * CLI flags and TABLESMITH_* environment variables:
 * flag > config file > environment > built-in default.
 */

import { z } from 'zod'
import { DEFAULT_PROJECT_CONFIG } from '../generators/project-assembler.js'
import type { ProjectConfig } from '../generators/project-assembler.js'
import { STORAGE_BACKENDS } from '../features/feature-pack.js'
import { TARGET_IDS } from '../targets/target.js'

const featureSwitchesSchema = z.object({
  socialLogin: z.boolean(),
  mail: z.boolean(),
  fileStorage: z.boolean(),
  passwordReset: z.boolean(),
})

type FeatureSwitches = ProjectConfig['features']

const SWITCH_KEYS = featureSwitchesSchema.keyof().options

/**
 * What a config file may contain. Every key is optional.
 */
export const configFileSchema = z
  .object({
    target: z.enum(TARGET_IDS),
    namespace: z.string().trim().min(1, 'namespace must not be blank'),
    projectName: z.string().trim().min(1),
    output: z.string().min(1),
    tests: z.boolean(),
    features: featureSwitchesSchema.partial(),
    socialProviders: z.array(z.string().min(1)).min(1),
    storageBackend: z.enum(STORAGE_BACKENDS),
    resetTokenMinutes: z.number().int().positive(),
  })
  .partial()
  .strict()

export type ConfigFile = z.infer<typeof configFileSchema>

/**
 * The fully resolved configuration a run uses
 */
export const projectConfigSchema = z.object({
  target: z.enum(TARGET_IDS, {
    errorMap: () => ({ message: `target must be one of: ${TARGET_IDS.join(', ')}` }),
  }),
  namespace: z.string().trim().min(1, 'namespace must not be blank'),
  projectName: z.string().trim().min(1),
  tests: z.boolean(),
  features: featureSwitchesSchema,
  socialProviders: z.array(z.string().min(1)),
  storageBackend: z.enum(STORAGE_BACKENDS),
  resetTokenMinutes: z.number().int().positive(),
})

/**
 * Typed helper for `tablesmith.config.ts`
 */
export function defineConfig(config: ConfigFile): ConfigFile {
  return config
}

export function parseConfigFile(input: unknown, source: string): ConfigFile {
  const result = configFileSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new Error(`Invalid config in ${source}:\n${issues.join('\n')}`)
  }
  return result.data
}

// ============================================================================
// Resolution
// ============================================================================

export interface ConfigOverrides {
  target?: string
  namespace?: string
  projectName?: string
  output?: string
  tests?: boolean
  features?: Partial<FeatureSwitches>
  socialProviders?: string[]
  storageBackend?: string
  resetTokenMinutes?: number
}

export interface ResolvedConfig {
  project: ProjectConfig
  output: string
}

export const DEFAULT_OUTPUT = './generated'

/**
 * Values taken from TABLESMITH_* variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    target: env.TABLESMITH_TARGET || undefined,
    namespace: env.TABLESMITH_NAMESPACE || undefined,
    output: env.TABLESMITH_OUTPUT || undefined,
  }
}

/**
 * Later layers win; a switch left undefined keeps the value below it
 */
function mergeSwitches(...layers: Array<Partial<FeatureSwitches> | undefined>): FeatureSwitches {
  const merged = { ...DEFAULT_PROJECT_CONFIG.features }
  for (const layer of layers) {
    for (const key of SWITCH_KEYS) {
      const value = layer?.[key]
      if (value !== undefined) merged[key] = value
    }
  }
  return merged
}

/**
 * Merge the layers, highest precedence first, and validate the result
 */
export function resolveConfig(flags: ConfigOverrides, file: ConfigFile = {}, env: ConfigOverrides = configFromEnv()): ResolvedConfig {
  const candidate = {
    target: flags.target ?? file.target ?? env.target,
    namespace: flags.namespace ?? file.namespace ?? env.namespace,
    projectName: flags.projectName ?? file.projectName ?? env.projectName ?? DEFAULT_PROJECT_CONFIG.projectName,
    tests: flags.tests ?? file.tests ?? env.tests ?? DEFAULT_PROJECT_CONFIG.tests,
    features: mergeSwitches(env.features, file.features, flags.features),
    socialProviders: flags.socialProviders ?? file.socialProviders ?? env.socialProviders ?? [...DEFAULT_PROJECT_CONFIG.socialProviders],
    storageBackend: flags.storageBackend ?? file.storageBackend ?? env.storageBackend ?? DEFAULT_PROJECT_CONFIG.storageBackend,
    resetTokenMinutes: flags.resetTokenMinutes ?? file.resetTokenMinutes ?? env.resetTokenMinutes ?? DEFAULT_PROJECT_CONFIG.resetTokenMinutes,
  }

  const result = projectConfigSchema.safeParse(candidate)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`)
  }

  return { project: result.data, output: flags.output ?? file.output ?? env.output ?? DEFAULT_OUTPUT }
}
