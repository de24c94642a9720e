/**
 * Feature Packs
 *
 * Optional cross-cutting modules a project can carry on top of its entities.
 * Each pack renders its own file map; the assembler merges them.
 */

export const FEATURE_IDS = ['social-login', 'mail', 'file-storage', 'password-reset'] as const

export type FeatureId = (typeof FEATURE_IDS)[number]

export const STORAGE_BACKENDS = ['local', 's3', 'azure'] as const

export type StorageBackend = (typeof STORAGE_BACKENDS)[number]

export interface FeatureOptions {
  namespace: string
  projectName: string
  /** OAuth providers for social login, e.g. `google`, `github` */
  socialProviders: readonly string[]
  storageBackend: StorageBackend
  /** Lifetime of a password-reset token */
  resetTokenMinutes: number
}

export interface FeaturePack {
  readonly id: FeatureId
  generate(options: FeatureOptions): Map<string, string>
}

/**
 * The packs a target can render, keyed by feature id
 */
export type FeaturePackSet = Readonly<Partial<Record<FeatureId, FeaturePack>>>

/**
 * Wrap a render function as a pack
 */
export function definePack(id: FeatureId, render: (options: FeatureOptions) => Map<string, string>): FeaturePack {
  return { id, generate: render }
}
