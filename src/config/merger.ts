/**
 * Config merger - layers raw config sources before validation
 *
 * Works on the unvalidated shape so defaults from the schema still apply to
 * whatever no layer sets.
 */

export type ConfigRecord = Record<string, unknown>

export function isConfigRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge: later sources win, nested objects merge key by key, arrays are
 * replaced whole. `undefined` never overrides a value.
 */
export function deepMerge(base: ConfigRecord, ...overrides: ConfigRecord[]): ConfigRecord {
  const result: ConfigRecord = { ...base }

  for (const override of overrides) {
    for (const [key, value] of Object.entries(override)) {
      if (value === undefined) continue

      const existing = result[key]
      if (isConfigRecord(existing) && isConfigRecord(value)) {
        result[key] = deepMerge(existing, value)
      } else {
        result[key] = value
      }
    }
  }

  return result
}
