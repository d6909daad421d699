import { describe, it, expect, beforeEach } from 'vitest'
import { createLogger, InMemoryMetrics, measureAsync } from '../../observability'

describe('Observability', () => {
  let metrics: InMemoryMetrics

  beforeEach(() => {
    metrics = new InMemoryMetrics()
  })

  describe('Metrics', () => {
    it('should increment counters', () => {
      metrics.increment('test.counter', 1)
      metrics.increment('test.counter', 2)

      expect(metrics.getCounter('test.counter')).toBe(3)
    })

    it('should set gauges', () => {
      metrics.gauge('test.gauge', 42)
      expect(metrics.getGauge('test.gauge')).toBe(42)

      metrics.gauge('test.gauge', 100)
      expect(metrics.getGauge('test.gauge')).toBe(100)
    })

    it('should track timings', () => {
      metrics.timing('test.duration', 123)
      metrics.timing('test.duration', 456)

      expect(metrics.getCounter('test.duration')).toBe(579)
    })

    it('should key labels independently of their order', () => {
      metrics.increment('graph.node.failure', 1, { graph: 'g', node: 'a' })
      metrics.increment('graph.node.failure', 1, { node: 'a', graph: 'g' })
      metrics.increment('graph.node.failure', 1, { graph: 'g', node: 'b' })

      expect(metrics.getCounter('graph.node.failure', { graph: 'g', node: 'a' })).toBe(2)
      expect(metrics.getCounter('graph.node.failure', { graph: 'g', node: 'b' })).toBe(1)
      expect(metrics.getCounter('graph.node.failure')).toBe(0)
    })

    it('should clear everything on reset', () => {
      metrics.increment('test.counter')
      metrics.gauge('test.gauge', 1)

      metrics.reset()

      expect(metrics.getCounter('test.counter')).toBe(0)
      expect(metrics.getGauge('test.gauge')).toBe(0)
    })
  })

  describe('Logger', () => {
    it('should create child logger with context', () => {
      const logger = createLogger({ level: 'silent' })
      const child = logger.child({ runId: 'run-123', node: 'fetch' })

      expect(child.bindings()).toEqual({ runId: 'run-123', node: 'fetch' })
      expect(child.level).toBe('silent')
    })

    it('should default to info', () => {
      expect(createLogger().level).toBe('info')
    })
  })

  describe('measureAsync', () => {
    it('should measure operation duration', async () => {
      const result = await measureAsync(metrics, 'op.duration', async () => 'done', { op: 'load' })

      expect(result).toBe('done')
      expect(metrics.getCounter('op.duration', { op: 'load' })).toBeGreaterThanOrEqual(0)
    })

    it('should label failed operations and rethrow', async () => {
      metrics.timing('op.duration', 5, { op: 'load', status: 'error' })

      await expect(
        measureAsync(
          metrics,
          'op.duration',
          async () => {
            throw new Error('boom')
          },
          { op: 'load' }
        )
      ).rejects.toThrow('boom')

      expect(metrics.getCounter('op.duration', { op: 'load', status: 'error' })).toBeGreaterThanOrEqual(5)
      expect(metrics.getCounter('op.duration', { op: 'load' })).toBe(0)
    })
  })
})
