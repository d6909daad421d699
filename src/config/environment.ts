/**
 * Environment Configuration with Validation
 *
 * Centralizes environment variable loading and provides fail-fast validation.
 * Use this instead of directly accessing process.env throughout the codebase.
 */

import type { ConfigRecord } from './merger'

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    value?: string
    searchedPaths?: string[]
    errors?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

export type Environment = Readonly<Record<string, string | undefined>>

function readInt(env: Environment, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined

  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer`, { key, value: raw })
  }
  return value
}

function readBoolean(env: Environment, key: string): boolean | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true
    case 'false':
    case '0':
    case 'no':
      return false
    default:
      throw new ConfigurationError(`${key} must be a boolean`, { key, value: raw })
  }
}

function readString(env: Environment, key: string): string | undefined {
  const raw = env[key]
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim()
}

/**
 * Load Redis configuration from environment
 */
export function loadRedisConfig(env: Environment = process.env): ConfigRecord | undefined {
  const host = readString(env, 'REDIS_HOST')
  const port = readInt(env, 'REDIS_PORT')
  const password = readString(env, 'REDIS_PASSWORD')
  const db = readInt(env, 'REDIS_DB')

  if (host === undefined && port === undefined && password === undefined && db === undefined) {
    return undefined
  }

  return { host, port, password, db }
}

/**
 * Config overrides taken from the environment, in the raw config shape.
 * Unset variables leave the key out so file values and defaults survive.
 */
export function loadEngineConfigFromEnv(env: Environment = process.env): ConfigRecord {
  return {
    logging: {
      level: readString(env, 'GRAPH_LOG_LEVEL'),
      pretty: readBoolean(env, 'GRAPH_LOG_PRETTY'),
    },
    checkpoint: {
      type: readString(env, 'GRAPH_CHECKPOINT_STORE'),
      keyPrefix: readString(env, 'REDIS_KEY_PREFIX'),
      redis: loadRedisConfig(env),
    },
    lock: {
      ttlMs: readInt(env, 'GRAPH_LOCK_TTL_MS'),
    },
  }
}
