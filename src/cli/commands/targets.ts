/**
 * Targets Command
 *
 * Lists the output ecosystems and the feature packs each one supports.
 */

import chalk from 'chalk'
import { FEATURE_IDS } from '../../features/feature-pack.js'
import { defaultRegistry } from '../../targets/registry.js'
import type { TargetRegistry } from '../../targets/registry.js'

export function describeTargets(registry: TargetRegistry = defaultRegistry): string[] {
  return registry.list().map((profile) => {
    const features = FEATURE_IDS.filter((id) => profile.features[id] !== undefined)
    return `${profile.id.padEnd(18)} ${profile.displayName} (${profile.framework}); features: ${features.length > 0 ? features.join(', ') : 'none'}`
  })
}

export function targetsCommand(): void {
  console.log(chalk.bold('Available targets:'))
  for (const line of describeTargets()) console.log(`  ${line}`)
}
