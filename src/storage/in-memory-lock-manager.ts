import { v4 as uuidv4 } from 'uuid'
import type { Lock, LockManager } from './lock-manager'

/**
 * InMemoryLockManager - locks for a single process
 */
export class InMemoryLockManager implements LockManager {
  private locks = new Map<string, Lock>()

  async acquire(key: string, ttlMs: number): Promise<Lock | null> {
    const existing = this.locks.get(key)

    // Check if lock exists and is still valid
    if (existing && existing.expiresAt > Date.now()) {
      return null
    }

    const lock: Lock = {
      key,
      token: uuidv4(),
      expiresAt: Date.now() + ttlMs,
    }

    this.locks.set(key, lock)
    return { ...lock }
  }

  async release(lock: Lock): Promise<void> {
    const existing = this.locks.get(lock.key)

    // Only release if token matches
    if (existing?.token === lock.token) {
      this.locks.delete(lock.key)
    }
  }

  async extend(lock: Lock, ttlMs: number): Promise<boolean> {
    const existing = this.locks.get(lock.key)

    // Only extend a live lock with a matching token
    if (existing?.token !== lock.token || existing.expiresAt <= Date.now()) {
      return false
    }

    existing.expiresAt = Date.now() + ttlMs
    lock.expiresAt = existing.expiresAt
    return true
  }

  isLocked(key: string): boolean {
    const existing = this.locks.get(key)
    return !!existing && existing.expiresAt > Date.now()
  }

  // Helper for testing
  clear(): void {
    this.locks.clear()
  }
}
