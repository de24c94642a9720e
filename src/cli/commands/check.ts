/**
 * Check Command
 *
 * Validates a schema document and reports what generation would drop,
 * without rendering anything.
 *
 * Usage:
 *   tablesmith check ./schema.json
 *   tablesmith check ./schema.json --strict
 */

import chalk from 'chalk'
import { formatDiagnostic, hasWarnings } from '../../core/diagnostics.js'
import type { Diagnostic } from '../../core/diagnostics.js'
import { RelationshipResolver } from '../../core/relationship-resolver.js'
import { loadSchemaFile } from '../../core/schema-loader.js'
import type { SchemaModel } from '../../core/schema-model.js'

export interface CheckOptions {
  strict?: boolean
  verbose?: boolean
}

export interface CheckResult {
  issues: string[]
  diagnostics: Diagnostic[]
}

export function checkSchema(schema: SchemaModel): CheckResult {
  return {
    issues: schema.validate(),
    diagnostics: new RelationshipResolver(schema).diagnostics(),
  }
}

export async function checkCommand(schemaPath: string, options: CheckOptions): Promise<void> {
  try {
    console.log(chalk.bold('tablesmith check'))
    console.log('================')
    console.log()

    const schema = await loadSchemaFile(schemaPath)
    const entities = schema.entityTables()
    console.log(`Loaded: ${schema.name} (${entities.length} entities, ${schema.junctionTables().length} junction tables)`)

    if (options.verbose) {
      const resolver = new RelationshipResolver(schema)
      for (const table of entities) {
        const relations = resolver.resolve(table)
        console.log(
          chalk.dim(
            `  ${table.entityName}: ${relations.outgoing.length} outgoing, ${relations.incoming.length} incoming, ${relations.manyToMany.length} many-to-many`,
          ),
        )
      }
    }

    const { issues, diagnostics } = checkSchema(schema)
    for (const issue of issues) console.log(`${chalk.red('✗')} ${issue}`)
    for (const diagnostic of diagnostics) console.log(`${chalk.yellow('⚠')} ${formatDiagnostic(diagnostic)}`)

    if (issues.length === 0 && diagnostics.length === 0) {
      console.log(chalk.green('\n✓ Schema is ready for generation'))
      return
    }

    if (issues.length > 0 || (options.strict && hasWarnings(diagnostics))) {
      console.error(chalk.red(`\n❌ ${issues.length} issues, ${diagnostics.length} warnings`))
      process.exit(1)
    }
  } catch (error) {
    console.error(chalk.red('❌ Check failed:'), error instanceof Error ? error.message : error)
    process.exit(1)
  }
}
