/**
 * Graph engine errors
 *
 * Only structural problems surface as exceptions. Ordinary node failures are
 * recorded in the graph's error field and never reach the caller.
 */

export type GraphErrorCode =
  | 'GRAPH_DEFINITION'
  | 'UNKNOWN_NODE'
  | 'ROUTING'
  | 'INVALID_UPDATE'
  | 'INTERRUPT_PROTOCOL'
  | 'RUN_NOT_FOUND'
  | 'RUN_EXISTS'
  | 'RUN_LOCKED'
  | 'RUN_ABORTED'
  | 'RUN_FAILED'
  | 'CHECKPOINT_STORE'
  | 'LOCK_SERVICE'

export class GraphError extends Error {
  public readonly code: GraphErrorCode
  public readonly details?: Record<string, unknown>

  constructor(code: GraphErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'GraphError'
    this.code = code
    this.details = details
  }
}

export class GraphDefinitionError extends GraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('GRAPH_DEFINITION', message, details)
    this.name = 'GraphDefinitionError'
  }
}

export class UnknownNodeError extends GraphError {
  constructor(public readonly node: string) {
    super('UNKNOWN_NODE', `Graph node not found: ${node}`, { node })
    this.name = 'UnknownNodeError'
  }
}

/**
 * A conditional or fan-out edge picked a successor it never declared
 */
export class RoutingError extends GraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ROUTING', message, details)
    this.name = 'RoutingError'
  }
}

export class InvalidUpdateError extends GraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_UPDATE', message, details)
    this.name = 'InvalidUpdateError'
  }
}

/**
 * Resume called for a run with no outstanding interrupt, or with a decision
 * the suspended node does not accept. The run is left untouched.
 */
export class InterruptProtocolError extends GraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INTERRUPT_PROTOCOL', message, details)
    this.name = 'InterruptProtocolError'
  }
}

export class RunNotFoundError extends GraphError {
  constructor(public readonly runId: string) {
    super('RUN_NOT_FOUND', `Run not found: ${runId}`, { runId })
    this.name = 'RunNotFoundError'
  }
}

export class RunAlreadyExistsError extends GraphError {
  constructor(public readonly runId: string) {
    super('RUN_EXISTS', `Run already exists: ${runId}`, { runId })
    this.name = 'RunAlreadyExistsError'
  }
}

export class RunLockedError extends GraphError {
  constructor(public readonly runId: string) {
    super('RUN_LOCKED', `Run ${runId} is being advanced by another caller`, { runId })
    this.name = 'RunLockedError'
  }
}

export class RunAbortedError extends GraphError {
  constructor(public readonly runId: string, superstep: number) {
    super('RUN_ABORTED', `Run ${runId} aborted before superstep ${superstep}`, { runId, superstep })
    this.name = 'RunAbortedError'
  }
}

/**
 * The run ended on a structural error; its last checkpoint is `failed`
 */
export class RunFailedError extends GraphError {
  constructor(public readonly runId: string, reason: string) {
    super('RUN_FAILED', `Run ${runId} failed: ${reason}`, { runId })
    this.name = 'RunFailedError'
  }
}

export class CheckpointStoreError extends GraphError {
  constructor(message: string, cause?: unknown) {
    super('CHECKPOINT_STORE', message)
    this.name = 'CheckpointStoreError'
    this.cause = cause
  }
}

/**
 * The lock service could not be reached. Like a store failure, the run keeps
 * its last checkpoint and can be recovered.
 */
export class LockServiceError extends GraphError {
  constructor(message: string, cause?: unknown) {
    super('LOCK_SERVICE', message)
    this.name = 'LockServiceError'
    this.cause = cause
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
