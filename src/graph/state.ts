/**
 * State Container - typed run state and its merge rules
 *
 * The state of a graph is a zod object schema. Each field is merged with one
 * of two disciplines, fixed when the graph is defined:
 * - overwrite: last writer (in launch order) wins
 * - append: contributions are concatenated in launch order
 */

import { z } from 'zod'
import { InvalidUpdateError, GraphDefinitionError } from './errors'

export type MergeDiscipline = 'overwrite' | 'append'

/**
 * Untyped state representation used at the persistence boundary
 */
export type StateRecord = Record<string, unknown>

export type StateSchema<Shape extends z.ZodRawShape = z.ZodRawShape> = z.ZodObject<Shape>

export type StateOf<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape>>

export type StateInput<Shape extends z.ZodRawShape> = z.input<z.ZodObject<Shape>>

export type StateUpdate<Shape extends z.ZodRawShape> = Partial<StateOf<Shape>>

/**
 * Field names whose value is an array - the only fields that may append
 */
export type ArrayFields<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends ReadonlyArray<unknown> ? K : never
}[keyof T] & string

function unwrapField(field: z.ZodTypeAny): z.ZodTypeAny {
  let current = field
  for (;;) {
    if (current instanceof z.ZodDefault) {
      current = current.removeDefault()
    } else if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap()
    } else {
      return current
    }
  }
}

/**
 * Check the append declarations against the schema and return them as a set
 */
export function resolveAppendFields<Shape extends z.ZodRawShape>(
  schema: z.ZodObject<Shape>,
  append: readonly string[]
): ReadonlySet<string> {
  const shape: z.ZodRawShape = schema.shape
  for (const field of append) {
    const definition = shape[field]
    if (!definition) {
      throw new GraphDefinitionError(`Append field "${field}" is not part of the state schema`, { field })
    }
    if (!(unwrapField(definition) instanceof z.ZodArray)) {
      throw new GraphDefinitionError(`Append field "${field}" must be an array`, { field })
    }
  }
  return new Set(append)
}

/**
 * Merge partial updates into a base state.
 *
 * Pure: neither `base` nor any update is mutated. Updates apply in the order
 * given. A key set to `undefined` counts as not written, so fields only change
 * when an update names them.
 */
export function mergeState(
  base: StateRecord,
  updates: ReadonlyArray<StateRecord>,
  appendFields: ReadonlySet<string>
): StateRecord {
  const next: StateRecord = { ...base }

  for (const update of updates) {
    for (const [key, value] of Object.entries(update)) {
      if (value === undefined) continue

      if (!appendFields.has(key)) {
        next[key] = value
        continue
      }

      if (!Array.isArray(value)) {
        throw new InvalidUpdateError(`Append field "${key}" expects an array contribution`, { field: key })
      }
      const existing = next[key]
      next[key] = Array.isArray(existing) ? [...existing, ...value] : [...value]
    }
  }

  return next
}

/**
 * Independent deep copy handed to each node invocation
 */
export function cloneState<T>(state: T): T {
  return structuredClone(state)
}

/**
 * Describe a zod failure as one line per issue
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}
