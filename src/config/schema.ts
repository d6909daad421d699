/**
 * Zod schemas for engine configuration
 * Validates YAML config files and environment overrides
 */

import { z } from 'zod'

/**
 * Redis connection configuration
 */
export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().positive().default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).default(0),
})

export type RedisConfig = z.infer<typeof RedisConfigSchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Checkpoint backend configuration
 */
export const CheckpointConfigSchema = z.object({
  type: z.enum(['in-memory', 'redis']).default('in-memory'),
  redis: RedisConfigSchema.optional(),
  keyPrefix: z.string().min(1).default('graph:checkpoint'),
})

export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>

/**
 * Default retry policy for nodes that do not declare their own
 */
export const RetryPolicyConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(1),
  initialIntervalMs: z.number().nonnegative().default(500),
  backoffFactor: z.number().min(1).default(2),
  maxIntervalMs: z.number().nonnegative().optional(),
  jitter: z.boolean().default(true),
  retryableErrors: z.array(z.string()).optional(),
})

export const LockConfigSchema = z.object({
  ttlMs: z.number().int().positive().default(15 * 60 * 1000), // 15 minutes
})

/**
 * Complete engine configuration
 */
export const EngineConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  checkpoint: CheckpointConfigSchema.default({}),
  retry: RetryPolicyConfigSchema.default({}),
  lock: LockConfigSchema.default({}),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): EngineConfig {
  return EngineConfigSchema.parse(config)
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: EngineConfig } | { success: false; errors: string[] } {
  const result = EngineConfigSchema.safeParse(config)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
