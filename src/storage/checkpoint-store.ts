import { z } from 'zod'

export type RunStatus = 'created' | 'running' | 'awaiting' | 'completed' | 'failed'

export const PendingTaskSchema = z.object({
  id: z.string(),
  node: z.string(),
  // 'edge' tasks are scheduled by edges and de-duplicated by node; 'send'
  // tasks come from a fan-out and never are
  kind: z.enum(['edge', 'send']).default('edge'),
  // Laid over the state copy of a fan-out invocation
  input: z.record(z.unknown()).optional(),
  // Decisions delivered to this task's suspend calls, by position
  resumeValues: z.array(z.unknown()).default([]),
})

export type PendingTask = z.infer<typeof PendingTaskSchema>

/**
 * Output of a task that finished in a superstep that could not commit
 * (another task suspended). Replayed on resume instead of re-running the task.
 */
export const TaskWriteSchema = z.object({
  taskId: z.string(),
  node: z.string(),
  update: z.record(z.unknown()),
})

export type TaskWrite = z.infer<typeof TaskWriteSchema>

export const InterruptRecordSchema = z.object({
  taskId: z.string(),
  node: z.string(),
  index: z.number().int().nonnegative(),
  payload: z.unknown(),
})

export type InterruptRecord = z.infer<typeof InterruptRecordSchema>

export const CheckpointSchema = z.object({
  runId: z.string(),
  checkpointId: z.string(),
  graph: z.string(),
  version: z.number().int().nonnegative(),
  superstep: z.number().int().nonnegative(),
  status: z.enum(['created', 'running', 'awaiting', 'completed', 'failed']),
  state: z.record(z.unknown()),
  frontier: z.array(PendingTaskSchema),
  pendingWrites: z.array(TaskWriteSchema).default([]),
  interrupt: InterruptRecordSchema.optional(),
  error: z.object({ name: z.string(), message: z.string() }).optional(),
  createdAt: z.string(),
})

export type Checkpoint = z.infer<typeof CheckpointSchema>

/**
 * CheckpointStore - durable run snapshots keyed by run id
 *
 * Checkpoints are append-only: a saved checkpoint is never changed, and
 * `loadLatest` returns the most recent `save` for the run, across restarts
 * for durable backends.
 */
export interface CheckpointStore {
  save(runId: string, checkpoint: Checkpoint): Promise<void>

  loadLatest(runId: string): Promise<Checkpoint | null>

  /**
   * All checkpoints of a run, oldest first
   */
  list(runId: string): Promise<Checkpoint[]>

  delete(runId: string): Promise<void>
}

export function serializeCheckpoint(runId: string, checkpoint: Checkpoint): string {
  if (checkpoint.runId !== runId) {
    throw new Error(`Checkpoint belongs to run ${checkpoint.runId}, not ${runId}`)
  }
  return JSON.stringify(checkpoint)
}

export function deserializeCheckpoint(payload: string): Checkpoint {
  return CheckpointSchema.parse(JSON.parse(payload))
}
