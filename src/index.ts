/**
 * tablesmith
 *
 * Generate API projects for several ecosystems from a relational schema model
 */

// Re-export core
export * from './core/index.js'

// Re-export generators
export * from './generators/blueprint.js'
export { ArtifactGenerator } from './generators/artifact-generator.js'
export type { ArtifactGeneratorOptions } from './generators/artifact-generator.js'
export { assemble, enabledFeatures, DEFAULT_PROJECT_CONFIG } from './generators/project-assembler.js'
export type {
  AssembleOptions,
  AssemblyResult,
  AssemblyStats,
  FeatureSwitches,
  ProjectConfig,
} from './generators/project-assembler.js'

// Re-export targets
export { TARGET_IDS, isTargetId } from './targets/target.js'
export type { TargetId, TargetProfile } from './targets/target.js'
export { TargetRegistry, builtinTargets, defaultRegistry } from './targets/registry.js'
export { ARTIFACT_KINDS, TargetRenderer } from './targets/renderer.js'
export type { ArtifactKind, ProjectContext, RenderedFile } from './targets/renderer.js'
export { SOURCE_TYPES, TableTypeMapper, isSourceType } from './targets/type-mapper.js'
export type { SourceType, TypeMapper, TypeTable } from './targets/type-mapper.js'

// Re-export feature packs
export { FEATURE_IDS, STORAGE_BACKENDS, definePack } from './features/feature-pack.js'
export type { FeatureId, FeatureOptions, FeaturePack, FeaturePackSet, StorageBackend } from './features/feature-pack.js'
export { FeaturePackAssembler, mergeFiles } from './features/feature-pack-assembler.js'

// Config helper for tablesmith.config.ts
export { defineConfig } from './cli/config.js'
export type { ConfigFile } from './cli/config.js'
