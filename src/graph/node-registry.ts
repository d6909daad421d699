import type { z } from 'zod'
import type { RetryPolicy } from '../runtime/retry-handler'
import type { NodeFn, NodeOptions } from './graph-dsl'
import { START, END } from './graph-dsl'
import { GraphDefinitionError, UnknownNodeError } from './errors'
import { describeIssues } from './state'

export interface RegisteredNode<State> {
  readonly name: string
  readonly fn: NodeFn<State>
  readonly retryPolicy?: Partial<RetryPolicy>
  readonly resumeSchema?: z.ZodTypeAny
}

export type DecisionCheck =
  | { valid: true }
  | { valid: false; issues: string[] }

/**
 * NodeRegistry - step name -> executable unit and its policies
 */
export class NodeRegistry<State> {
  private readonly nodes = new Map<string, RegisteredNode<State>>()

  register(name: string, fn: NodeFn<State>, options: NodeOptions = {}): void {
    if (!name || name === START || name === END) {
      throw new GraphDefinitionError(`Invalid node name: "${name}"`, { node: name })
    }
    if (this.nodes.has(name)) {
      throw new GraphDefinitionError(`Node already registered: ${name}`, { node: name })
    }
    if (options.retryPolicy?.maxAttempts !== undefined && options.retryPolicy.maxAttempts < 1) {
      throw new GraphDefinitionError(`Node ${name} needs at least one attempt`, { node: name })
    }

    this.nodes.set(name, {
      name,
      fn,
      retryPolicy: options.retryPolicy,
      resumeSchema: options.resumeSchema,
    })
  }

  get(name: string): RegisteredNode<State> {
    const node = this.nodes.get(name)
    if (!node) {
      throw new UnknownNodeError(name)
    }
    return node
  }

  has(name: string): boolean {
    return this.nodes.has(name)
  }

  names(): string[] {
    return Array.from(this.nodes.keys())
  }

  checkDecision(name: string, decision: unknown): DecisionCheck {
    const schema = this.get(name).resumeSchema
    if (!schema) {
      return { valid: true }
    }

    const result = schema.safeParse(decision)
    return result.success ? { valid: true } : { valid: false, issues: describeIssues(result.error) }
  }
}
