/**
 * Core Module
 *
 * Schema model, naming rules, relationship resolution and diagnostics.
 */

export * from './naming.js'
export * from './schema-model.js'
export * from './schema-loader.js'
export * from './relationship-resolver.js'
export * from './diagnostics.js'
