#!/usr/bin/env node
/**
 * tablesmith CLI
 *
 * Generate API projects for several ecosystems from a relational schema
 */

import { Command } from 'commander'
import { checkCommand } from './commands/check.js'
import { generateCommand } from './commands/generate.js'
import { targetsCommand } from './commands/targets.js'

const program = new Command()

program
  .name('tablesmith')
  .description('Generate API projects from a relational schema model')
  .version('0.1.0')

// Generate command
// Defaults can also come from tablesmith.config.ts or TABLESMITH_* variables
program
  .command('generate')
  .description('Generate a project from a schema document')
  .argument('<schema>', 'Schema document (JSON file)')
  .option('-t, --target <id>', 'Target ecosystem (see `tablesmith targets`)')
  .option('-n, --namespace <ns>', 'Base package / namespace, e.g. com.example.catalog')
  .option('-p, --project-name <name>', 'Project name used for the application entry point')
  .option('-o, --output <dir>', 'Output directory (default ./generated)')
  .option('-c, --config <path>', 'Config file (default tablesmith.config.ts in cwd)')
  .option('--tests', 'Generate per-entity tests')
  .option('--no-tests', 'Skip per-entity tests')
  .option('--social-login', 'Add the social login pack')
  .option('--mail', 'Add the mail pack')
  .option('--file-storage', 'Add the file storage pack')
  .option('--password-reset', 'Add the password reset pack')
  .option('--providers <list>', 'Social login providers, comma separated')
  .option('--storage <backend>', 'File storage backend (local|s3|azure)')
  .option('--reset-token-minutes <n>', 'Password reset token lifetime')
  .option('--dry-run', 'Preview without writing files')
  .option('--verbose', 'Show detailed output')
  .option('--strict', 'Exit with error code if diagnostics contain warnings (for CI)')
  .action(generateCommand)

// Check command
program
  .command('check')
  .description('Validate a schema document and report dropped relations')
  .argument('<schema>', 'Schema document (JSON file)')
  .option('--strict', 'Exit with error code on warnings (for CI)')
  .option('--verbose', 'Show per-table relation counts')
  .action(checkCommand)

// Targets command
program
  .command('targets')
  .description('List available targets and their feature packs')
  .action(targetsCommand)

// Parse arguments
if (process.argv.length < 3) {
  program.help()
} else {
  await program.parseAsync()
}

export default program
