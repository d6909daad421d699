/**
 * Lock - handle on a held run lock
 */
export interface Lock {
  key: string
  token: string
  expiresAt: number
}

/**
 * LockManager - keeps a run single-writer
 *
 * The executor holds the run's lock for a whole run/resume call, so a second
 * caller advancing the same run is turned away instead of forking its
 * checkpoint history.
 */
export interface LockManager {
  /**
   * Acquire a lock (returns null if already locked)
   */
  acquire(key: string, ttlMs: number): Promise<Lock | null>

  /**
   * Release a lock
   */
  release(lock: Lock): Promise<void>

  /**
   * Extend lock TTL. Resolves false once the lock has expired or passed to
   * another holder.
   */
  extend(lock: Lock, ttlMs: number): Promise<boolean>
}
