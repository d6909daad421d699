import type { Checkpoint, CheckpointStore } from './checkpoint-store'
import { deserializeCheckpoint, serializeCheckpoint } from './checkpoint-store'

/**
 * The list commands the store needs. An ioredis client satisfies it.
 */
export interface CheckpointRedisClient {
  rpush(key: string, value: string): Promise<number>
  lindex(key: string, index: number): Promise<string | null>
  lrange(key: string, start: number, stop: number): Promise<string[]>
  del(key: string): Promise<number>
}

/**
 * Redis-backed checkpoint store
 *
 * Each run owns one Redis list; every checkpoint is appended with RPUSH, so
 * the tail of the list is always the latest write. Entries are validated on
 * the way out.
 */
export class RedisCheckpointStore implements CheckpointStore {
  private readonly keyPrefix: string

  constructor(
    private readonly redis: CheckpointRedisClient,
    options?: { keyPrefix?: string }
  ) {
    this.keyPrefix = options?.keyPrefix || 'graph:checkpoint'
  }

  async save(runId: string, checkpoint: Checkpoint): Promise<void> {
    this.assertRunId(runId)
    await this.redis.rpush(this.makeKey(runId), serializeCheckpoint(runId, checkpoint))
  }

  async loadLatest(runId: string): Promise<Checkpoint | null> {
    this.assertRunId(runId)
    const payload = await this.redis.lindex(this.makeKey(runId), -1)
    if (!payload) return null

    return this.parse(runId, payload)
  }

  async list(runId: string): Promise<Checkpoint[]> {
    this.assertRunId(runId)
    const payloads = await this.redis.lrange(this.makeKey(runId), 0, -1)
    return payloads.map(payload => this.parse(runId, payload))
  }

  async delete(runId: string): Promise<void> {
    this.assertRunId(runId)
    await this.redis.del(this.makeKey(runId))
  }

  private parse(runId: string, payload: string): Checkpoint {
    try {
      return deserializeCheckpoint(payload)
    } catch (error) {
      throw new Error(`Invalid checkpoint data for run ${runId}`, { cause: error })
    }
  }

  private assertRunId(runId: string): void {
    if (!runId || runId.trim() === '') {
      throw new Error('runId is required')
    }
  }

  private makeKey(runId: string): string {
    return `${this.keyPrefix}:${runId}`
  }
}
