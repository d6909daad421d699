/**
 * Graph Executor - superstep scheduler with durable checkpoints
 *
 * A run advances in supersteps. Each superstep:
 * 1. takes the ready tasks off the frontier
 * 2. runs them concurrently, each on its own copy of the state, each wrapped
 *    by the retry handler
 * 3. waits for all of them (join barrier)
 * 4. merges their updates in launch order
 * 5. evaluates the outgoing edges of every task against the merged state to
 *    build the next frontier
 * 6. saves a checkpoint, after confirming the run lock is still held
 *
 * A task that suspends stops the run after the barrier. The checkpoint saved
 * then holds the state from before the superstep plus the writes of the tasks
 * that did finish, so resuming re-runs only what did not.
 */

import { z } from 'zod'
import { v4 as uuidv4 } from 'uuid'
import type { Logger } from 'pino'
import { createLogger, InMemoryMetrics, measureAsync, type Metrics } from '../observability'
import { DEFAULT_RETRY_POLICIES, RetryHandler, type RetryPolicy } from '../runtime/retry-handler'
import type { Checkpoint, CheckpointStore, InterruptRecord, PendingTask, RunStatus, TaskWrite } from '../storage/checkpoint-store'
import type { Lock, LockManager } from '../storage/lock-manager'
import { InMemoryLockManager } from '../storage/in-memory-lock-manager'
import type { NodeContext } from './graph-dsl'
import { START, END } from './graph-dsl'
import type { CompiledGraph } from './state-graph'
import type { RegisteredNode } from './node-registry'
import { GraphInterrupt, SuspendController, isGraphInterrupt, type DecisionSchema } from './interrupt'
import {
  CheckpointStoreError,
  InterruptProtocolError,
  InvalidUpdateError,
  LockServiceError,
  RoutingError,
  RunAbortedError,
  RunAlreadyExistsError,
  RunFailedError,
  RunLockedError,
  RunNotFoundError,
  toError,
} from './errors'
import {
  cloneState,
  describeIssues,
  mergeState,
  type StateInput,
  type StateOf,
  type StateRecord,
} from './state'

export interface ExecutorConfig {
  /** Default policy for nodes that declare none; merged over a single attempt */
  retry?: Partial<RetryPolicy>
  lockTtlMs?: number
}

export interface GraphExecutorOptions {
  checkpointStore: CheckpointStore
  /** Share one lock manager between executors that serve the same runs */
  lockManager?: LockManager
  logger?: Logger
  metrics?: Metrics
  config?: ExecutorConfig
  sleep?: (ms: number) => Promise<void>
  random?: () => number
}

export interface RunOptions {
  runId?: string
  /** Checked at every superstep boundary */
  signal?: AbortSignal
}

export interface ResumeOptions {
  signal?: AbortSignal
}

export interface InterruptInfo {
  node: string
  payload: unknown
}

export type RunResult<State> =
  | { status: 'completed'; runId: string; state: State }
  | { status: 'awaiting'; runId: string; state: State; interrupt: InterruptInfo }

export interface RunSnapshot {
  runId: string
  graph: string
  status: RunStatus
  version: number
  superstep: number
  state: StateRecord
  /** Node names still to run, in frontier order */
  pending: string[]
  interrupt?: InterruptInfo
  error?: { name: string; message: string }
  updatedAt: string
}

const DEFAULT_LOCK_TTL_MS = 15 * 60 * 1000
const NO_APPEND: ReadonlySet<string> = new Set()

interface RunContext {
  runId: string
  logger: Logger
  lock: Lock
  signal?: AbortSignal
  /** Set once an extend finds the lock expired or held by someone else */
  lockLost: boolean
}

type TaskOutcome =
  | { kind: 'written'; task: PendingTask; update: StateRecord; replayed: boolean }
  | { kind: 'interrupted'; task: PendingTask; interrupt: GraphInterrupt }

type ScheduledTask = Pick<PendingTask, 'node' | 'kind' | 'input'>

type CheckpointChanges = Pick<Checkpoint, 'status' | 'state' | 'frontier' | 'superstep'> &
  Partial<Pick<Checkpoint, 'pendingWrites' | 'interrupt' | 'error'>>

/**
 * Context handed to one node attempt
 */
class InvocationContext implements NodeContext {
  private readonly suspension: SuspendController

  constructor(
    readonly runId: string,
    readonly node: string,
    readonly superstep: number,
    readonly attempt: number,
    readonly logger: Logger,
    resumeValues: readonly unknown[]
  ) {
    this.suspension = new SuspendController(resumeValues)
  }

  suspend(payload: unknown): unknown
  suspend<D>(payload: unknown, schema: DecisionSchema<D>): D
  suspend<D>(payload: unknown, schema?: DecisionSchema<D>): unknown {
    return schema ? this.suspension.suspend(payload, schema) : this.suspension.suspend(payload)
  }
}

export class GraphExecutor<Shape extends z.ZodRawShape> {
  private readonly store: CheckpointStore
  private readonly lockManager: LockManager
  private readonly logger: Logger
  private readonly metrics: Metrics
  private readonly retry: RetryHandler
  private readonly lockTtlMs: number

  constructor(
    private readonly graph: CompiledGraph<Shape>,
    options: GraphExecutorOptions
  ) {
    this.store = options.checkpointStore
    this.lockManager = options.lockManager ?? new InMemoryLockManager()
    this.logger = (options.logger ?? createLogger({ level: 'silent' })).child({ graph: graph.name })
    this.metrics = options.metrics ?? new InMemoryMetrics()
    this.lockTtlMs = options.config?.lockTtlMs ?? DEFAULT_LOCK_TTL_MS
    this.retry = new RetryHandler(
      { ...DEFAULT_RETRY_POLICIES.none, ...options.config?.retry },
      {
        sleep: options.sleep,
        random: options.random,
        metrics: this.metrics,
        logger: this.logger,
        neverRetry: isGraphInterrupt,
      }
    )
  }

  /**
   * Start a run and drive it until it completes or suspends
   */
  async run(input: StateInput<Shape>, options: RunOptions = {}): Promise<RunResult<StateOf<Shape>>> {
    const runId = options.runId ?? uuidv4()

    return this.withRunLock(runId, options.signal, async run => {
      if (await this.load(runId)) {
        throw new RunAlreadyExistsError(runId)
      }

      const state = this.initialState(input)
      const origin: Checkpoint = {
        runId,
        checkpointId: uuidv4(),
        graph: this.graph.name,
        version: 0,
        superstep: 0,
        status: 'created',
        state,
        frontier: [],
        pendingWrites: [],
        createdAt: new Date().toISOString(),
      }

      run.logger.info('Run started')

      let created: Checkpoint
      try {
        const frontier = await this.schedule([START], this.graph.parseState(state), 0, [])
        created = await this.persist(
          this.successor(origin, { status: 'created', state, frontier, superstep: 0 }),
          run
        )
      } catch (error) {
        return this.fail(origin, error, run)
      }

      return this.drive(created, run)
    })
  }

  /**
   * Deliver a decision to the suspended node and continue the run.
   * Nothing is written unless the decision is accepted.
   */
  async resume(runId: string, decision: unknown, options: ResumeOptions = {}): Promise<RunResult<StateOf<Shape>>> {
    return this.withRunLock(runId, options.signal, async run => {
      const latest = await this.load(runId)
      if (!latest) {
        throw new RunNotFoundError(runId)
      }

      const interrupt = latest.interrupt
      if (latest.status !== 'awaiting' || !interrupt) {
        throw new InterruptProtocolError(`Run ${runId} has no outstanding interrupt`, {
          runId,
          status: latest.status,
        })
      }

      const check = this.graph.nodes.checkDecision(interrupt.node, decision)
      if (!check.valid) {
        throw new InterruptProtocolError(`Decision rejected by node ${interrupt.node}: ${check.issues.join('; ')}`, {
          runId,
          node: interrupt.node,
          issues: check.issues,
        })
      }

      if (!latest.frontier.some(task => task.id === interrupt.taskId)) {
        throw new InterruptProtocolError(`Suspended task ${interrupt.taskId} is not pending`, {
          runId,
          taskId: interrupt.taskId,
        })
      }

      const frontier = latest.frontier.map(task =>
        task.id === interrupt.taskId ? { ...task, resumeValues: [...task.resumeValues, decision] } : task
      )

      run.logger.info({ node: interrupt.node }, 'Run resumed')

      const resumed = await this.persist(
        this.successor(latest, {
          status: 'running',
          state: latest.state,
          frontier,
          superstep: latest.superstep,
          pendingWrites: latest.pendingWrites,
        }),
        run
      )
      return this.drive(resumed, run)
    })
  }

  /**
   * Continue a run from its latest checkpoint, e.g. after a process restart.
   * Finished and suspended runs are reported as they are.
   */
  async recover(runId: string, options: ResumeOptions = {}): Promise<RunResult<StateOf<Shape>>> {
    return this.withRunLock(runId, options.signal, async run => {
      const latest = await this.load(runId)
      if (!latest) {
        throw new RunNotFoundError(runId)
      }

      switch (latest.status) {
        case 'completed':
        case 'awaiting':
          return this.toResult(latest)
        case 'failed':
          throw new RunFailedError(runId, latest.error?.message ?? 'unknown error')
        case 'created':
        case 'running':
          run.logger.info({ superstep: latest.superstep, version: latest.version }, 'Recovering run')
          return this.drive(latest, run)
      }
    })
  }

  async getRun(runId: string): Promise<RunSnapshot | null> {
    const latest = await this.load(runId)
    if (!latest) return null

    return {
      runId: latest.runId,
      graph: latest.graph,
      status: latest.status,
      version: latest.version,
      superstep: latest.superstep,
      state: latest.state,
      pending: latest.frontier.map(task => task.node),
      interrupt: latest.interrupt && { node: latest.interrupt.node, payload: latest.interrupt.payload },
      error: latest.error,
      updatedAt: latest.createdAt,
    }
  }

  /**
   * Every checkpoint of the run, oldest first
   */
  async getHistory(runId: string): Promise<Checkpoint[]> {
    try {
      return await this.store.list(runId)
    } catch (error) {
      throw new CheckpointStoreError(`Failed to list checkpoints of run ${runId}`, error)
    }
  }

  private async drive(start: Checkpoint, run: RunContext): Promise<RunResult<StateOf<Shape>>> {
    let current = start

    try {
      for (;;) {
        if (current.frontier.length === 0) {
          if (current.status !== 'completed') {
            current = await this.persist(
              this.successor(current, {
                status: 'completed',
                state: current.state,
                frontier: [],
                superstep: current.superstep,
              }),
              run
            )
          }
          this.metrics.increment('graph.run.completed', 1, { graph: this.graph.name })
          run.logger.info({ superstep: current.superstep }, 'Run completed')
          return this.toResult(current)
        }

        if (run.signal?.aborted) {
          throw new RunAbortedError(run.runId, current.superstep + 1)
        }

        current = await this.superstep(current, run)
        if (current.status === 'awaiting') {
          return this.toResult(current)
        }
      }
    } catch (error) {
      return this.fail(current, error, run)
    }
  }

  private async superstep(checkpoint: Checkpoint, run: RunContext): Promise<Checkpoint> {
    const superstep = checkpoint.superstep + 1
    const { ready, deferred } = this.partition(checkpoint.frontier)
    const replay = new Map(checkpoint.pendingWrites.map(write => [write.taskId, write]))

    // Resolve every node before launching anything
    const launches = ready.map(task => ({ task, node: this.graph.nodes.get(task.node) }))

    this.metrics.increment('graph.superstep', 1, { graph: this.graph.name })
    run.logger.debug(
      {
        superstep,
        tasks: ready.map(task => task.node),
        deferred: deferred.map(task => task.node),
        replayed: replay.size,
      },
      'Superstep started'
    )

    const outcomes = await Promise.all(
      launches.map(({ task, node }): Promise<TaskOutcome> => {
        const written = replay.get(task.id)
        if (written) {
          const replayed: TaskOutcome = { kind: 'written', task, update: written.update, replayed: true }
          return Promise.resolve(replayed)
        }
        return this.invoke(task, node, checkpoint.state, superstep, run)
      })
    )

    const suspended = this.firstInterrupt(outcomes)
    if (suspended) {
      const writes: TaskWrite[] = [...checkpoint.pendingWrites]
      for (const outcome of outcomes) {
        if (outcome.kind === 'written' && !outcome.replayed) {
          writes.push({ taskId: outcome.task.id, node: outcome.task.node, update: outcome.update })
        }
      }

      const interrupt: InterruptRecord = {
        taskId: suspended.task.id,
        node: suspended.task.node,
        index: suspended.interrupt.index,
        payload: suspended.interrupt.payload,
      }

      const awaiting = await this.persist(
        this.successor(checkpoint, {
          status: 'awaiting',
          state: checkpoint.state,
          frontier: checkpoint.frontier,
          superstep: checkpoint.superstep,
          pendingWrites: writes,
          interrupt,
        }),
        run
      )

      this.metrics.increment('graph.run.interrupted', 1, { graph: this.graph.name, node: interrupt.node })
      run.logger.info({ superstep, node: interrupt.node }, 'Run suspended')
      return awaiting
    }

    const updates = outcomes.map(outcome => (outcome.kind === 'written' ? outcome.update : {}))
    const state = this.validateMerged(mergeState(checkpoint.state, updates, this.graph.appendFields), superstep)

    const frontier = await this.schedule(
      ready.map(task => task.node),
      this.graph.parseState(state),
      superstep,
      deferred
    )
    this.metrics.gauge('graph.frontier.size', frontier.length, { graph: this.graph.name })

    return this.persist(
      this.successor(checkpoint, {
        status: frontier.length === 0 ? 'completed' : 'running',
        state,
        frontier,
        superstep,
      }),
      run
    )
  }

  /**
   * Run one task with retries. Failures become an error-field write; only a
   * suspension escapes as its own outcome.
   */
  private async invoke(
    task: PendingTask,
    node: RegisteredNode<StateOf<Shape>>,
    state: StateRecord,
    superstep: number,
    run: RunContext
  ): Promise<TaskOutcome> {
    const logger = run.logger.child({ node: task.node, taskId: task.id })
    const labels = { graph: this.graph.name, node: task.node }
    const base = task.input ? mergeState(state, [task.input], NO_APPEND) : state
    const startedAt = Date.now()

    try {
      const output = await this.retry.withRetry(
        async attempt => {
          const view = this.graph.parseState(cloneState(base))
          const ctx = new InvocationContext(run.runId, task.node, superstep, attempt, logger, task.resumeValues)
          return node.fn(view, ctx)
        },
        node.retryPolicy,
        labels
      )

      const check = this.graph.checkUpdate(output)
      if (!check.success) {
        return this.failure(task, `invalid update (${check.issues.join('; ')})`, logger, labels)
      }
      return { kind: 'written', task, update: check.data, replayed: false }
    } catch (caught) {
      if (isGraphInterrupt(caught)) {
        return { kind: 'interrupted', task, interrupt: caught }
      }
      return this.failure(task, toError(caught).message, logger, labels)
    } finally {
      this.metrics.timing('graph.node.duration', Date.now() - startedAt, labels)
    }
  }

  private failure(
    task: PendingTask,
    message: string,
    logger: Logger,
    labels: Record<string, string>
  ): TaskOutcome {
    this.metrics.increment('graph.node.failure', 1, labels)
    logger.warn({ error: message }, 'Node failed')
    return {
      kind: 'written',
      task,
      update: { [this.graph.errorField]: [`${task.node}: ${message}`] },
      replayed: false,
    }
  }

  private firstInterrupt(
    outcomes: readonly TaskOutcome[]
  ): { task: PendingTask; interrupt: GraphInterrupt } | undefined {
    for (const outcome of outcomes) {
      if (outcome.kind === 'interrupted') return outcome
    }
    return undefined
  }

  /**
   * Hold back an edge task while another pending task can still reach its
   * node and it cannot reach that task back. Tasks in one cycle never block
   * each other.
   */
  private partition(frontier: readonly PendingTask[]): { ready: PendingTask[]; deferred: PendingTask[] } {
    const ready: PendingTask[] = []
    const deferred: PendingTask[] = []

    for (const task of frontier) {
      const blocked =
        task.kind === 'edge' &&
        frontier.some(
          other =>
            other.node !== task.node &&
            this.graph.canReach(other.node, task.node) &&
            !this.graph.canReach(task.node, other.node)
        )
      if (blocked) {
        deferred.push(task)
      } else {
        ready.push(task)
      }
    }

    return { ready, deferred }
  }

  /**
   * Next frontier: carried tasks first, then the successors of each source in
   * launch order. Edge tasks for a node already pending are dropped.
   */
  private async schedule(
    sources: readonly string[],
    state: Readonly<StateOf<Shape>>,
    superstep: number,
    carried: readonly PendingTask[]
  ): Promise<PendingTask[]> {
    const frontier: PendingTask[] = [...carried]
    let sequence = 0

    for (const source of sources) {
      for (const next of await this.successors(source, state)) {
        if (next.kind === 'edge' && frontier.some(task => task.kind === 'edge' && task.node === next.node)) {
          continue
        }
        frontier.push({ ...next, id: `${superstep}:${sequence++}`, resumeValues: [] })
      }
    }

    return frontier
  }

  private async successors(from: string, state: Readonly<StateOf<Shape>>): Promise<ScheduledTask[]> {
    const scheduled: ScheduledTask[] = []

    for (const edge of this.graph.edgesFrom(from)) {
      switch (edge.kind) {
        case 'static':
          if (edge.to !== END) scheduled.push({ kind: 'edge', node: edge.to })
          break

        case 'conditional': {
          const branch = await edge.decide(state)
          const target = Object.prototype.hasOwnProperty.call(edge.targets, branch) ? edge.targets[branch] : undefined
          if (target === undefined) {
            throw new RoutingError(`Conditional edge from ${from} chose undeclared branch "${branch}"`, {
              from,
              branch,
              declared: Object.keys(edge.targets),
            })
          }
          if (target !== END) scheduled.push({ kind: 'edge', node: target })
          break
        }

        case 'fan-out': {
          for (const invocation of await edge.route(state)) {
            if (!edge.targets.includes(invocation.node)) {
              throw new RoutingError(`Fan-out from ${from} sent to undeclared node ${invocation.node}`, {
                from,
                node: invocation.node,
                declared: [...edge.targets],
              })
            }
            if (invocation.input === undefined) {
              scheduled.push({ kind: 'send', node: invocation.node })
              continue
            }

            const check = this.graph.checkUpdate(invocation.input)
            if (!check.success) {
              throw new RoutingError(`Fan-out from ${from} sent invalid input to ${invocation.node}`, {
                from,
                node: invocation.node,
                issues: check.issues,
              })
            }
            scheduled.push({ kind: 'send', node: invocation.node, input: check.data })
          }
          break
        }
      }
    }

    return scheduled
  }

  private initialState(input: StateInput<Shape>): StateRecord {
    try {
      return this.graph.normalizeState(input)
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new InvalidUpdateError('Initial state does not match the state schema', {
          issues: describeIssues(error),
        })
      }
      throw error
    }
  }

  private validateMerged(merged: StateRecord, superstep: number): StateRecord {
    try {
      return this.graph.normalizeState(merged)
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new InvalidUpdateError(`Merged state failed validation in superstep ${superstep}`, {
          superstep,
          issues: describeIssues(error),
        })
      }
      throw error
    }
  }

  private toResult(checkpoint: Checkpoint): RunResult<StateOf<Shape>> {
    const state = this.graph.parseState(checkpoint.state)

    if (checkpoint.status === 'awaiting') {
      if (!checkpoint.interrupt) {
        throw new InterruptProtocolError(`Run ${checkpoint.runId} is awaiting without an interrupt record`)
      }
      return {
        status: 'awaiting',
        runId: checkpoint.runId,
        state,
        interrupt: { node: checkpoint.interrupt.node, payload: checkpoint.interrupt.payload },
      }
    }

    return { status: 'completed', runId: checkpoint.runId, state }
  }

  /**
   * Record a structural failure and rethrow it. Store and lock failures and
   * aborts leave the last checkpoint as the run's latest.
   */
  private async fail(last: Checkpoint, error: unknown, run: RunContext): Promise<never> {
    if (
      error instanceof CheckpointStoreError ||
      error instanceof LockServiceError ||
      error instanceof RunLockedError ||
      error instanceof RunAbortedError
    ) {
      run.logger.error({ err: error }, 'Run stopped')
      throw error
    }

    const cause = toError(error)
    run.logger.error({ err: cause, superstep: last.superstep }, 'Run failed')
    await this.persist(
      this.successor(last, {
        status: 'failed',
        state: last.state,
        frontier: last.frontier,
        superstep: last.superstep,
        error: { name: cause.name, message: cause.message },
      }),
      run
    )
    throw error
  }

  private successor(previous: Checkpoint, changes: CheckpointChanges): Checkpoint {
    return {
      runId: previous.runId,
      graph: previous.graph,
      pendingWrites: [],
      ...changes,
      checkpointId: uuidv4(),
      version: previous.version + 1,
      createdAt: new Date().toISOString(),
    }
  }

  private async persist(checkpoint: Checkpoint, run: RunContext): Promise<Checkpoint> {
    await this.holdLock(run)

    try {
      await measureAsync(this.metrics, 'graph.checkpoint.save', () => this.store.save(checkpoint.runId, checkpoint), {
        graph: this.graph.name,
      })
    } catch (error) {
      throw new CheckpointStoreError(
        `Failed to save checkpoint ${checkpoint.version} of run ${checkpoint.runId}`,
        error
      )
    }
    return checkpoint
  }

  private async load(runId: string): Promise<Checkpoint | null> {
    try {
      return await this.store.loadLatest(runId)
    } catch (error) {
      throw new CheckpointStoreError(`Failed to load run ${runId}`, error)
    }
  }

  private async withRunLock<T>(
    runId: string,
    signal: AbortSignal | undefined,
    fn: (run: RunContext) => Promise<T>
  ): Promise<T> {
    let lock: Lock | null
    try {
      lock = await this.lockManager.acquire(`run:${runId}`, this.lockTtlMs)
    } catch (error) {
      throw new LockServiceError(`Failed to acquire the lock of run ${runId}`, error)
    }
    if (!lock) {
      throw new RunLockedError(runId)
    }

    const run: RunContext = { runId, logger: this.logger.child({ runId }), lock, signal, lockLost: false }
    const heartbeat = this.startHeartbeat(run)
    try {
      return await fn(run)
    } finally {
      clearInterval(heartbeat)
      try {
        await this.lockManager.release(lock)
      } catch (error) {
        // the lock still lapses after its TTL
        run.logger.warn({ err: toError(error) }, 'Failed to release run lock')
      }
    }
  }

  /**
   * Keep the lock alive while nodes run. A superstep can outlast the TTL.
   */
  private startHeartbeat(run: RunContext): NodeJS.Timeout {
    return setInterval(async () => {
      if (run.lockLost) return
      try {
        if (!(await this.lockManager.extend(run.lock, this.lockTtlMs))) {
          run.lockLost = true
          run.logger.warn('Run lock lost')
        }
      } catch (error) {
        // persist() checks again and stops the run if the service stays down
        run.logger.warn({ err: toError(error) }, 'Run lock heartbeat failed')
      }
    }, Math.max(1, Math.floor(this.lockTtlMs / 3)))
  }

  /**
   * Extend the lock before a write. A run whose lock lapsed must not write:
   * another caller may already be advancing it.
   */
  private async holdLock(run: RunContext): Promise<void> {
    let held = false
    if (!run.lockLost) {
      try {
        held = await this.lockManager.extend(run.lock, this.lockTtlMs)
      } catch (error) {
        throw new LockServiceError(`Failed to extend the lock of run ${run.runId}`, error)
      }
    }

    if (!held) {
      run.lockLost = true
      run.logger.error('Run lock lost, checkpoint not written')
      throw new RunLockedError(run.runId)
    }
  }
}
