import { v4 as uuidv4 } from 'uuid'
import type { Lock, LockManager } from './lock-manager'

// Delete or extend only while the caller still owns the token
const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0`

const EXTEND_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('pexpire', KEYS[1], ARGV[2])
end
return 0`

/**
 * The commands the lock manager needs. An ioredis client satisfies it.
 */
export interface LockRedisClient {
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number, nx: 'NX'): Promise<'OK' | null>
  eval(script: string, numkeys: number, ...args: Array<string | number>): Promise<unknown>
}

/**
 * RedisLockManager - run locks shared by every process on one Redis
 *
 * Single-instance locking: SET NX PX to acquire, token-checked scripts to
 * release and extend.
 */
export class RedisLockManager implements LockManager {
  constructor(private readonly redis: LockRedisClient) {}

  async acquire(key: string, ttlMs: number): Promise<Lock | null> {
    const token = uuidv4()
    const result = await this.redis.set(this.makeKey(key), token, 'PX', ttlMs, 'NX')
    if (result !== 'OK') {
      return null
    }

    return { key, token, expiresAt: Date.now() + ttlMs }
  }

  async release(lock: Lock): Promise<void> {
    await this.redis.eval(RELEASE_SCRIPT, 1, this.makeKey(lock.key), lock.token)
  }

  async extend(lock: Lock, ttlMs: number): Promise<boolean> {
    const extended = await this.redis.eval(EXTEND_SCRIPT, 1, this.makeKey(lock.key), lock.token, ttlMs)
    if (extended !== 1) {
      return false
    }

    lock.expiresAt = Date.now() + ttlMs
    return true
  }

  private makeKey(key: string): string {
    return `lock:${key}`
  }
}
