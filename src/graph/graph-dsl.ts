/**
 * Graph DSL - node, edge and invocation types
 *
 * A graph is a set of named nodes joined by three kinds of edges:
 * - static: unconditional successor
 * - conditional: a decision function over the state picks one successor
 *   from a fixed set
 * - fan-out: a routing function returns any number of `send()` invocations,
 *   each running concurrently on its own copy of the state
 */

import type { z } from 'zod'
import type { Logger } from 'pino'
import type { RetryPolicy } from '../runtime/retry-handler'
import type { DecisionSchema } from './interrupt'

export const START = '__start__'
export const END = '__end__'

export type Awaitable<T> = T | Promise<T>

/**
 * One fan-out invocation. `input` is laid over the branch's copy of the
 * state; it is not merged into the run state.
 */
export interface Send<State> {
  readonly node: string
  readonly input?: Partial<State>
}

export function send<State>(node: string, input?: Partial<State>): Send<State> {
  return input === undefined ? { node } : { node, input }
}

export interface NodeContext {
  readonly runId: string
  readonly node: string
  readonly superstep: number
  /** 1 for the first try of this invocation */
  readonly attempt: number
  readonly logger: Logger

  /**
   * Pause the run and hand `payload` to the caller. Returns the decision
   * delivered by `resume`; with a schema the decision is parsed by it.
   */
  suspend(payload: unknown): unknown
  suspend<D>(payload: unknown, schema: DecisionSchema<D>): D
}

export type NodeResult<State> = Partial<State> | void

export type NodeFn<State> = (
  state: Readonly<State>,
  ctx: NodeContext
) => Awaitable<NodeResult<State>>

export interface NodeOptions {
  retryPolicy?: Partial<RetryPolicy>
  /**
   * Decisions accepted when resuming this node. Checked before the run is
   * touched, so a bad decision leaves the run suspended.
   */
  resumeSchema?: z.ZodTypeAny
}

export type DecideFn<State, K extends string = string> = (state: Readonly<State>) => Awaitable<K>

export type RouteFn<State> = (state: Readonly<State>) => Awaitable<ReadonlyArray<Send<State>>>

export interface StaticEdge {
  readonly kind: 'static'
  readonly from: string
  readonly to: string
}

export interface ConditionalEdge<State> {
  readonly kind: 'conditional'
  readonly from: string
  readonly decide: DecideFn<State>
  /** decision key -> node name (or END) */
  readonly targets: Readonly<Record<string, string>>
}

export interface FanOutEdge<State> {
  readonly kind: 'fan-out'
  readonly from: string
  readonly route: RouteFn<State>
  readonly targets: readonly string[]
}

export type Edge<State> = StaticEdge | ConditionalEdge<State> | FanOutEdge<State>
