/**
 * Project Assembler
 *
 * One generation run: resolve relationships once, render shared target
 * files, then every entity table in schema order, then feature packs.
 * Returns the merged file map with the diagnostics gathered on the way.
 */

import { DiagnosticCollector } from '../core/diagnostics.js'
import type { Diagnostic } from '../core/diagnostics.js'
import { RelationshipResolver } from '../core/relationship-resolver.js'
import type { SchemaModel } from '../core/schema-model.js'
import { FeaturePackAssembler, mergeFiles } from '../features/feature-pack-assembler.js'
import type { FeatureId, StorageBackend } from '../features/feature-pack.js'
import { defaultRegistry } from '../targets/registry.js'
import type { TargetRegistry } from '../targets/registry.js'
import { ARTIFACT_KINDS } from '../targets/renderer.js'
import { ArtifactGenerator } from './artifact-generator.js'
import { entityRef } from './blueprint.js'

// ============================================================================
// Configuration
// ============================================================================

export interface FeatureSwitches {
  socialLogin: boolean
  mail: boolean
  fileStorage: boolean
  passwordReset: boolean
}

export interface ProjectConfig {
  target: string
  /** Base package / namespace, e.g. `com.example.catalog` */
  namespace: string
  projectName: string
  /** Emit the per-entity test artifact */
  tests: boolean
  features: FeatureSwitches
  socialProviders: readonly string[]
  storageBackend: StorageBackend
  resetTokenMinutes: number
}

export const DEFAULT_PROJECT_CONFIG: Omit<ProjectConfig, 'target' | 'namespace'> = {
  projectName: 'app',
  tests: true,
  features: { socialLogin: false, mail: false, fileStorage: false, passwordReset: false },
  socialProviders: ['google', 'github'],
  storageBackend: 'local',
  resetTokenMinutes: 30,
}

const SWITCHES: ReadonlyArray<[keyof FeatureSwitches, FeatureId]> = [
  ['socialLogin', 'social-login'],
  ['mail', 'mail'],
  ['fileStorage', 'file-storage'],
  ['passwordReset', 'password-reset'],
]

export function enabledFeatures(switches: FeatureSwitches): FeatureId[] {
  return SWITCHES.filter(([key]) => switches[key]).map(([, id]) => id)
}

// ============================================================================
// Assembly
// ============================================================================

export interface AssemblyStats {
  entities: number
  junctionTables: number
  files: number
}

export interface AssemblyResult {
  files: Map<string, string>
  diagnostics: Diagnostic[]
  stats: AssemblyStats
}

export interface AssembleOptions {
  registry?: TargetRegistry
}

/**
 * Generate a complete project for `config.target`.
 *
 * @throws Error when the target id is unknown
 */
export function assemble(schema: SchemaModel, config: ProjectConfig, options: AssembleOptions = {}): AssemblyResult {
  const target = (options.registry ?? defaultRegistry).require(config.target)
  const diagnostics = new DiagnosticCollector()

  const resolver = new RelationshipResolver(schema)
  diagnostics.addAll(resolver.diagnostics())

  const entities = schema.entityTables()
  const generator = new ArtifactGenerator(target, {
    namespace: config.namespace,
    kinds: ARTIFACT_KINDS.filter((kind) => kind !== 'test' || config.tests),
    procedures: schema.functionsByTable(),
    diagnostics,
  })

  const packs = new FeaturePackAssembler(target.features, target.displayName)
  const requested = enabledFeatures(config.features)

  const files = new Map<string, string>()
  const shared = target.renderer.shared({
    namespace: config.namespace,
    projectName: config.projectName,
    entities: entities.map(entityRef),
    features: requested.filter((id) => packs.supports(id)),
  })
  for (const file of shared) files.set(file.path, file.content)

  for (const table of entities) {
    const relations = resolver.resolve(table)
    const generated = generator.generate(table, relations.outgoing, relations.incoming, relations.manyToMany)
    mergeFiles(files, generated, diagnostics, `Table '${table.name}'`)
  }

  const featureFiles = packs.assemble(
    requested,
    {
      namespace: config.namespace,
      projectName: config.projectName,
      socialProviders: config.socialProviders,
      storageBackend: config.storageBackend,
      resetTokenMinutes: config.resetTokenMinutes,
    },
    diagnostics,
  )
  mergeFiles(files, featureFiles, diagnostics, 'Feature packs')

  return {
    files,
    diagnostics: diagnostics.list(),
    stats: {
      entities: entities.length,
      junctionTables: schema.junctionTables().length,
      files: files.size,
    },
  }
}
