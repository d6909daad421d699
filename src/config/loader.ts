/**
 * YAML configuration loader with type-safe parsing
 *
 * Sources, lowest precedence first: schema defaults, the YAML file,
 * environment variables.
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { validateConfigSafe, type EngineConfig } from './schema'
import { ConfigurationError, loadEngineConfigFromEnv, type Environment } from './environment'
import { deepMerge, isConfigRecord, type ConfigRecord } from './merger'

export const DEFAULT_CONFIG_PATHS = [
  'superstep.config.yaml',
  'superstep.config.yml',
  'config/superstep.yaml',
  'config/superstep.yml',
]

function readYaml(filePath: string): ConfigRecord {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, { searchedPaths: [absolutePath] })
  }

  let parsed: unknown
  try {
    parsed = yaml.load(readFileSync(absolutePath, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Failed to parse YAML in ${filePath}: ${message}`)
  }

  // An empty file is an empty config
  if (parsed === undefined || parsed === null) return {}
  if (!isConfigRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`)
  }
  return parsed
}

function finalize(raw: ConfigRecord, source: string): EngineConfig {
  const result = validateConfigSafe(raw)
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration (${source}): ${result.errors.join('; ')}`, {
      errors: result.errors,
    })
  }
  return result.data
}

/**
 * Load and validate config from YAML file, with environment overrides
 * @throws ConfigurationError if the file is missing, unparsable or invalid
 */
export function loadConfig(filePath: string, env: Environment = process.env): EngineConfig {
  return finalize(deepMerge(readYaml(filePath), loadEngineConfigFromEnv(env)), filePath)
}

/**
 * Config from defaults and environment only
 */
export function loadConfigFromEnv(env: Environment = process.env): EngineConfig {
  return finalize(loadEngineConfigFromEnv(env), 'environment')
}

/**
 * Load config from GRAPH_CONFIG_PATH, else the first default path that
 * exists, else defaults plus environment
 */
export function loadConfigAuto(env: Environment = process.env, cwd: string = process.cwd()): EngineConfig {
  const configPath = env.GRAPH_CONFIG_PATH
  if (configPath) {
    return loadConfig(resolve(cwd, configPath), env)
  }

  for (const path of DEFAULT_CONFIG_PATHS) {
    const candidate = resolve(cwd, path)
    if (existsSync(candidate)) {
      return loadConfig(candidate, env)
    }
  }

  return loadConfigFromEnv(env)
}
