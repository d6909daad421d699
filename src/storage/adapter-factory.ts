/**
 * Adapter Factory - Configuration-based adapter instantiation
 *
 * Enables selecting the checkpoint backend via configuration without code changes.
 */

import { Redis } from 'ioredis'
import type { CheckpointConfig, RedisConfig } from '../config/schema'
import type { CheckpointStore } from './checkpoint-store'
import type { LockManager } from './lock-manager'
import { InMemoryCheckpointStore } from './in-memory-checkpoint-store'
import { InMemoryLockManager } from './in-memory-lock-manager'
import { RedisCheckpointStore } from './redis-checkpoint-store'
import { RedisLockManager } from './redis-lock-manager'

export interface StorageAdapters {
  checkpointStore: CheckpointStore
  lockManager: LockManager
  /** Closes connections the factory opened */
  close(): Promise<void>
}

/**
 * Factory for creating adapters from configuration
 */
export class AdapterFactory {
  static createRedisClient(config?: RedisConfig): Redis {
    return new Redis({
      host: config?.host ?? 'localhost',
      port: config?.port ?? 6379,
      password: config?.password,
      db: config?.db ?? 0,
    })
  }

  /**
   * Create the checkpoint store and a lock manager that lives beside it.
   * A Redis backend shares one connection between both.
   */
  static createStorage(config: CheckpointConfig): StorageAdapters {
    if (config.type === 'in-memory') {
      return {
        checkpointStore: new InMemoryCheckpointStore(),
        lockManager: new InMemoryLockManager(),
        close: async () => {},
      }
    }

    const redis = AdapterFactory.createRedisClient(config.redis)
    return {
      checkpointStore: new RedisCheckpointStore(redis, { keyPrefix: config.keyPrefix }),
      lockManager: new RedisLockManager(redis),
      close: async () => {
        await redis.quit()
      },
    }
  }
}
