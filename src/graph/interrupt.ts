/**
 * Interrupt Controller - human-in-the-loop suspension
 *
 * A node calls `ctx.suspend(payload)` to pause the run. The first time, the
 * call unwinds to the executor with a GraphInterrupt; nothing after it in the
 * node runs. When the run is resumed the node executes again from its start
 * and the same `suspend` call returns the external decision instead.
 *
 * Nodes must not keep anything they need after a suspension in local
 * variables: the process may restart between suspend and resume.
 */

import { z } from 'zod'

export class GraphInterrupt extends Error {
  constructor(
    public readonly payload: unknown,
    public readonly index: number
  ) {
    super('Graph execution suspended')
    this.name = 'GraphInterrupt'
  }
}

/**
 * Nodes that catch every error must rethrow interrupts
 */
export function isGraphInterrupt(error: unknown): error is GraphInterrupt {
  return error instanceof GraphInterrupt
}

/**
 * Decision shape used by approval nodes
 */
export const ApprovalDecisionSchema = z.object({
  action: z.enum(['approve', 'reject']),
  feedback: z.string().optional(),
})

export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>

export type DecisionSchema<D> = z.ZodType<D, z.ZodTypeDef, unknown>

/**
 * Tracks suspend calls for one node attempt. Resume values are matched to
 * suspend calls by position, so a node may suspend more than once.
 */
export class SuspendController {
  private calls = 0

  constructor(private readonly resumeValues: readonly unknown[]) {}

  suspend(payload: unknown): unknown
  suspend<D>(payload: unknown, schema: DecisionSchema<D>): D
  suspend<D>(payload: unknown, schema?: DecisionSchema<D>): unknown {
    const index = this.calls++
    if (index >= this.resumeValues.length) {
      throw new GraphInterrupt(payload, index)
    }

    const value = this.resumeValues[index]
    return schema ? schema.parse(value) : value
  }
}
