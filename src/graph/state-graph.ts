/**
 * StateGraph - declarative graph builder
 *
 * Collects nodes and edges, then `compile()` validates the definition and
 * freezes it into a CompiledGraph the executor can run.
 *
 * @example
 * const graph = new StateGraph(PipelineState, { errorField: 'errorLog', append: ['rawArticles'] })
 *   .addNode('fetch', fetchNode, { retryPolicy: DEFAULT_RETRY_POLICIES.transient })
 *   .addNode('review', reviewNode, { resumeSchema: ApprovalDecisionSchema })
 *   .addEdge(START, 'fetch')
 *   .addEdge('fetch', 'review')
 *   .addConditionalEdges('review', state => state.approved ? 'done' : 'fetch', { done: END, fetch: 'fetch' })
 *   .compile()
 */

import type { z } from 'zod'
import type {
  DecideFn,
  Edge,
  NodeFn,
  NodeOptions,
  RouteFn,
} from './graph-dsl'
import { START, END } from './graph-dsl'
import { NodeRegistry } from './node-registry'
import { GraphDefinitionError } from './errors'
import {
  describeIssues,
  resolveAppendFields,
  type ArrayFields,
  type StateOf,
  type StateRecord,
} from './state'

export interface StateGraphOptions<State> {
  name?: string
  /** Fields merged by concatenation; every other field is overwritten */
  append?: ReadonlyArray<ArrayFields<State>>
  /** Append field (string items) that collects node failures */
  errorField: ArrayFields<State>
}

export type UpdateCheck =
  | { success: true; data: StateRecord }
  | { success: false; issues: string[] }

export class StateGraph<Shape extends z.ZodRawShape> {
  private readonly registry = new NodeRegistry<StateOf<Shape>>()
  private readonly edges: Array<Edge<StateOf<Shape>>> = []

  constructor(
    private readonly schema: z.ZodObject<Shape>,
    private readonly options: StateGraphOptions<StateOf<Shape>>
  ) {}

  addNode(name: string, fn: NodeFn<StateOf<Shape>>, options?: NodeOptions): this {
    this.registry.register(name, fn, options)
    return this
  }

  addEdge(from: string, to: string): this {
    this.edges.push({ kind: 'static', from, to })
    return this
  }

  /**
   * Route to one of a fixed set of successors. `targets` is either the list
   * of node names the decision may return, or a map from decision key to node.
   */
  addConditionalEdges<K extends string>(
    from: string,
    decide: DecideFn<StateOf<Shape>, K>,
    targets: readonly K[] | Readonly<Record<K, string>>
  ): this {
    const mapping: Record<string, string> = {}
    if (isNameList(targets)) {
      for (const name of targets) mapping[name] = name
    } else {
      for (const [key, node] of Object.entries<string>(targets)) mapping[key] = node
    }

    this.edges.push({ kind: 'conditional', from, decide, targets: mapping })
    return this
  }

  /**
   * Dynamic fan-out: every `send()` returned by `route` becomes a concurrent
   * invocation in the next superstep.
   */
  addFanOut(from: string, route: RouteFn<StateOf<Shape>>, targets: readonly string[]): this {
    this.edges.push({ kind: 'fan-out', from, route, targets: [...targets] })
    return this
  }

  compile(): CompiledGraph<Shape> {
    const errorField = this.options.errorField
    const appendFields = resolveAppendFields(this.schema, [...(this.options.append ?? []), errorField])

    const shape: z.ZodRawShape = this.schema.shape
    const errorFieldSchema = shape[errorField]
    if (!errorFieldSchema || !errorFieldSchema.safeParse(['node: failure']).success) {
      throw new GraphDefinitionError(`Error field "${errorField}" must hold a list of strings`, { field: errorField })
    }

    const isNode = (name: string) => this.registry.has(name)

    if (!this.edges.some(edge => edge.from === START)) {
      throw new GraphDefinitionError('Graph has no entry edge from START')
    }

    for (const edge of this.edges) {
      if (edge.from !== START && !isNode(edge.from)) {
        throw new GraphDefinitionError(`Edge starts at unknown node: ${edge.from}`, { from: edge.from })
      }

      const targets = edgeTargets(edge)
      if (targets.length === 0) {
        throw new GraphDefinitionError(`Edge from ${edge.from} declares no targets`, { from: edge.from })
      }
      for (const target of targets) {
        const allowEnd = edge.kind !== 'fan-out'
        if (target === END && allowEnd) continue
        if (!isNode(target)) {
          throw new GraphDefinitionError(`Edge from ${edge.from} targets unknown node: ${target}`, {
            from: edge.from,
            to: target,
          })
        }
      }
    }

    return new CompiledGraph(
      this.options.name ?? 'graph',
      this.schema,
      this.registry,
      this.edges,
      appendFields,
      errorField
    )
  }
}

function isNameList<K extends string>(targets: readonly K[] | Readonly<Record<K, string>>): targets is readonly K[] {
  return Array.isArray(targets)
}

export function edgeTargets<State>(edge: Edge<State>): string[] {
  switch (edge.kind) {
    case 'static':
      return [edge.to]
    case 'conditional':
      return Object.values(edge.targets)
    case 'fan-out':
      return [...edge.targets]
  }
}

/**
 * Validated, immutable graph
 */
export class CompiledGraph<Shape extends z.ZodRawShape> {
  private readonly outgoing = new Map<string, Array<Edge<StateOf<Shape>>>>()
  private readonly reachable = new Map<string, Set<string>>()
  private readonly updateSchema: z.ZodTypeAny
  private readonly recordSchema: z.ZodTypeAny

  constructor(
    readonly name: string,
    readonly schema: z.ZodObject<Shape>,
    readonly nodes: NodeRegistry<StateOf<Shape>>,
    edges: ReadonlyArray<Edge<StateOf<Shape>>>,
    readonly appendFields: ReadonlySet<string>,
    readonly errorField: string
  ) {
    this.updateSchema = schema.partial().strict()
    this.recordSchema = schema

    for (const edge of edges) {
      const list = this.outgoing.get(edge.from) ?? []
      list.push(edge)
      this.outgoing.set(edge.from, list)
    }

    for (const node of nodes.names()) {
      this.reachable.set(node, this.walkFrom(node))
    }
  }

  edgesFrom(node: string): ReadonlyArray<Edge<StateOf<Shape>>> {
    return this.outgoing.get(node) ?? []
  }

  /**
   * True when a path of one or more edges leads from `from` to `to`
   */
  canReach(from: string, to: string): boolean {
    return this.reachable.get(from)?.has(to) ?? false
  }

  parseState(raw: unknown): StateOf<Shape> {
    return this.schema.parse(raw)
  }

  /**
   * Validate a state and return it in its persisted form
   */
  normalizeState(raw: unknown): StateRecord {
    const data: StateRecord = { ...this.recordSchema.parse(raw) }
    return data
  }

  /**
   * Check a node's output: only known fields, each with a valid value
   */
  checkUpdate(update: unknown): UpdateCheck {
    if (update === undefined || update === null) {
      return { success: true, data: {} }
    }

    const result = this.updateSchema.safeParse(update)
    if (!result.success) {
      return { success: false, issues: describeIssues(result.error) }
    }
    const data: StateRecord = { ...result.data }
    return { success: true, data }
  }

  private walkFrom(start: string): Set<string> {
    const seen = new Set<string>()
    const queue = [start]

    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      for (const edge of this.edgesFrom(current)) {
        for (const target of edgeTargets(edge)) {
          if (target === END || seen.has(target)) continue
          seen.add(target)
          queue.push(target)
        }
      }
    }

    return seen
  }
}
