/**
 * Generate Command
 *
 * Main entry point: schema document in, project tree out.
 */

import { promises as fs } from 'fs'
import { dirname, join, resolve } from 'path'
import chalk from 'chalk'
import { formatDiagnostic, hasWarnings } from '../../core/diagnostics.js'
import type { Diagnostic } from '../../core/diagnostics.js'
import { loadSchemaFile } from '../../core/schema-loader.js'
import { assemble } from '../../generators/project-assembler.js'
import type { AssemblyStats } from '../../generators/project-assembler.js'
import { resolveConfig } from '../config.js'
import type { ConfigOverrides } from '../config.js'
import { loadConfigFile } from '../utils/config-loader.js'

export interface GenerateOptions {
  target?: string
  namespace?: string
  projectName?: string
  output?: string
  config?: string
  tests?: boolean
  socialLogin?: boolean
  mail?: boolean
  fileStorage?: boolean
  passwordReset?: boolean
  providers?: string
  storage?: string
  resetTokenMinutes?: string
  dryRun?: boolean
  verbose?: boolean
  strict?: boolean
}

export interface GenerateSummary {
  output: string
  written: string[]
  diagnostics: Diagnostic[]
  stats: AssemblyStats
}

async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true })
}

async function writeFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path))
  await fs.writeFile(path, content, 'utf8')
}

function parseMinutes(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const minutes = Number.parseInt(value, 10)
  if (Number.isNaN(minutes)) {
    throw new Error(`--reset-token-minutes expects a number, got '${value}'`)
  }
  return minutes
}

/**
 * Translate commander options into config overrides. Only flags the user
 * actually passed are set.
 */
export function overridesFromOptions(options: GenerateOptions): ConfigOverrides {
  return {
    target: options.target,
    namespace: options.namespace,
    projectName: options.projectName,
    output: options.output,
    tests: options.tests,
    features: {
      socialLogin: options.socialLogin,
      mail: options.mail,
      fileStorage: options.fileStorage,
      passwordReset: options.passwordReset,
    },
    socialProviders: options.providers
      ?.split(',')
      .map((provider) => provider.trim())
      .filter(Boolean),
    storageBackend: options.storage,
    resetTokenMinutes: parseMinutes(options.resetTokenMinutes),
  }
}

/**
 * Run a generation without touching the process; the command wrapper handles
 * exit codes
 */
export async function runGenerate(schemaPath: string, options: GenerateOptions): Promise<GenerateSummary> {
  const { config: fileConfig, path: configPath } = await loadConfigFile(options.config)
  if (configPath && options.verbose) console.log(chalk.dim(`Using config ${configPath}`))

  const { project, output } = resolveConfig(overridesFromOptions(options), fileConfig)

  console.log(`Loading schema from: ${schemaPath}`)
  const schema = await loadSchemaFile(schemaPath)
  console.log(`Loaded: ${schema.name} (${schema.tables.length} tables)`)

  const result = assemble(schema, project)
  const outputDir = resolve(output)
  const written: string[] = []

  for (const [path, content] of result.files) {
    const target = join(outputDir, path)
    if (!options.dryRun) await writeFile(target, content)
    written.push(path)
    if (options.verbose) console.log(chalk.dim(`  ${options.dryRun ? 'Would write' : 'Written'}: ${path}`))
  }

  return { output: outputDir, written, diagnostics: result.diagnostics, stats: result.stats }
}

export async function generateCommand(schemaPath: string, options: GenerateOptions): Promise<void> {
  try {
    console.log(chalk.bold('tablesmith generate'))
    console.log('===================')
    console.log()

    const summary = await runGenerate(schemaPath, options)

    for (const diagnostic of summary.diagnostics) {
      const icon = diagnostic.severity === 'warning' ? chalk.yellow('⚠') : chalk.blue('ℹ')
      console.log(`${icon} ${formatDiagnostic(diagnostic)}`)
    }

    const { entities, junctionTables, files } = summary.stats
    const verb = options.dryRun ? 'Would generate' : 'Generated'
    console.log()
    console.log(chalk.green(`✓ ${verb} ${files} files for ${entities} entities (${junctionTables} junction tables)`))
    if (!options.dryRun) console.log(`  Output: ${summary.output}`)

    if (options.strict && hasWarnings(summary.diagnostics)) {
      console.error(chalk.red('❌ Diagnostics reported warnings (--strict)'))
      process.exit(1)
    }
  } catch (error) {
    console.error(chalk.red('❌ Generation failed:'), error instanceof Error ? error.message : error)
    process.exit(1)
  }
}
