/**
 * Engine wiring - one configuration value in, ready-to-use executors out
 */

import type { z } from 'zod'
import type { EngineConfig } from './config/schema'
import { createLogger, InMemoryMetrics, type Logger, type Metrics } from './observability'
import { AdapterFactory, type StorageAdapters } from './storage/adapter-factory'
import { GraphExecutor } from './graph/graph-executor'
import type { CompiledGraph } from './graph/state-graph'

export interface EngineOverrides {
  logger?: Logger
  metrics?: Metrics
  /** Replaces the backend the config selects */
  storage?: StorageAdapters
}

export interface Engine {
  readonly config: EngineConfig
  readonly logger: Logger
  readonly metrics: Metrics
  readonly storage: StorageAdapters
  executor<Shape extends z.ZodRawShape>(graph: CompiledGraph<Shape>): GraphExecutor<Shape>
  close(): Promise<void>
}

export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  const logger = overrides.logger ?? createLogger({ level: config.logging.level, pretty: config.logging.pretty })
  const metrics = overrides.metrics ?? new InMemoryMetrics()
  const storage = overrides.storage ?? AdapterFactory.createStorage(config.checkpoint)

  logger.debug({ checkpoint: config.checkpoint.type }, 'Engine created')

  return {
    config,
    logger,
    metrics,
    storage,
    executor<Shape extends z.ZodRawShape>(graph: CompiledGraph<Shape>): GraphExecutor<Shape> {
      return new GraphExecutor(graph, {
        checkpointStore: storage.checkpointStore,
        lockManager: storage.lockManager,
        logger,
        metrics,
        config: { retry: config.retry, lockTtlMs: config.lock.ttlMs },
      })
    },
    close: () => storage.close(),
  }
}
