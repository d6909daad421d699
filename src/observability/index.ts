import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Observability - structured logging and metrics
 *
 * - Structured JSON logging via Pino (pretty output for local development)
 * - Basic metrics (counters, gauges, timings) kept in memory
 *
 * Nothing here is global: callers build a logger and a metrics sink and hand
 * them to the executor.
 */

export type { Logger } from 'pino'

export interface LoggerOptions {
  level?: string
  pretty?: boolean
  name?: string
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name,
    level: options.level ?? 'info',
    ...(options.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  })
}

/**
 * Metrics interface - simple counters and gauges
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  gauge(name: string, value: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

/**
 * Simple in-memory metrics (can swap for Prometheus/Datadog later)
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private gauges = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.gauges.set(key, value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getGauge(name: string, labels?: Record<string, string>): number {
    return this.gauges.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

/**
 * Measure duration of an async operation
 */
export async function measureAsync<T>(
  metrics: Metrics,
  name: string,
  operation: () => Promise<T>,
  labels?: Record<string, string>
): Promise<T> {
  const start = Date.now()
  try {
    const result = await operation()
    metrics.timing(name, Date.now() - start, labels)
    return result
  } catch (error) {
    metrics.timing(name, Date.now() - start, { ...labels, status: 'error' })
    throw error
  }
}
