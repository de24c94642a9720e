/**
 * Feature Pack Assembler
 *
 * Runs the requested packs for a target and merges their file maps by key,
 * in pack order.
 */

import type { DiagnosticCollector } from '../core/diagnostics.js'
import { FEATURE_IDS } from './feature-pack.js'
import type { FeatureId, FeatureOptions, FeaturePackSet } from './feature-pack.js'

/**
 * Merge `source` into `target`. A key already present is overwritten and
 * reported as a path collision.
 */
export function mergeFiles(
  target: Map<string, string>,
  source: ReadonlyMap<string, string>,
  diagnostics: DiagnosticCollector,
  origin: string,
): void {
  for (const [path, content] of source) {
    if (target.has(path)) {
      diagnostics.warn('path-collision', `${origin} overwrote a previously generated file`, { path })
    }
    target.set(path, content)
  }
}

export class FeaturePackAssembler {
  constructor(
    private readonly packs: FeaturePackSet,
    private readonly targetName: string,
  ) {}

  supports(id: FeatureId): boolean {
    return this.packs[id] !== undefined
  }

  /**
   * Generate the requested packs. Requests are processed in canonical pack
   * order regardless of how they were listed.
   */
  assemble(requested: Iterable<FeatureId>, options: FeatureOptions, diagnostics: DiagnosticCollector): Map<string, string> {
    const wanted = new Set(requested)
    const files = new Map<string, string>()

    for (const id of FEATURE_IDS) {
      if (!wanted.has(id)) continue
      const pack = this.packs[id]
      if (!pack) {
        diagnostics.warn('unsupported-feature', `Feature '${id}' is not available for ${this.targetName}`)
        continue
      }
      mergeFiles(files, pack.generate(options), diagnostics, `Feature '${id}'`)
    }
    return files
  }
}
