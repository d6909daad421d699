import type { Checkpoint, CheckpointStore } from './checkpoint-store'
import { deserializeCheckpoint, serializeCheckpoint } from './checkpoint-store'

/**
 * InMemoryCheckpointStore - for development and ephemeral runs
 *
 * Holds serialized copies so nothing the caller keeps can alter a stored
 * checkpoint, and every load hands out a fresh object.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private store = new Map<string, string[]>()

  constructor() {
    if (process.env.NODE_ENV === 'production') {
      console.warn(
        '⚠️  [InMemoryCheckpointStore] Using in-memory adapter in production. ' +
        'Runs will not survive a restart. ' +
        'Use RedisCheckpointStore instead.'
      )
    }
  }

  async save(runId: string, checkpoint: Checkpoint): Promise<void> {
    const payload = serializeCheckpoint(runId, checkpoint)
    const entries = this.store.get(runId) ?? []
    entries.push(payload)
    this.store.set(runId, entries)
  }

  async loadLatest(runId: string): Promise<Checkpoint | null> {
    const entries = this.store.get(runId)
    const latest = entries?.[entries.length - 1]
    return latest ? deserializeCheckpoint(latest) : null
  }

  async list(runId: string): Promise<Checkpoint[]> {
    return (this.store.get(runId) ?? []).map(deserializeCheckpoint)
  }

  async delete(runId: string): Promise<void> {
    this.store.delete(runId)
  }

  // Helper for testing
  clear(): void {
    this.store.clear()
  }
}
