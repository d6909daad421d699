/**
 * Configuration module
 * Provides YAML-based config with Zod validation and environment overrides
 */

export * from './schema'
export * from './environment'
export * from './loader'
export * from './merger'
