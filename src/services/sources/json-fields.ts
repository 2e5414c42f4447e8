/**
 * Readers for untyped JSON returned by catalog backends
 */

import { isPlainObject } from '../../utils/errors.js'

export type JsonObject = Record<string, unknown>

export function stringField(data: JsonObject, key: string): string | null {
  const value = data[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return null
}

export function stringArrayField(data: JsonObject, key: string): string[] {
  const value = data[key]
  if (!Array.isArray(value)) return []
  return value.filter((entry): entry is string => typeof entry === 'string')
}

export function objectArrayField(data: JsonObject, key: string): JsonObject[] {
  const value = data[key]
  if (!Array.isArray(value)) return []
  return value.filter(isPlainObject)
}

/**
 * Removes empty strings and repeats, keeping first-seen order
 */
export function uniqueValues(values: readonly (string | null)[]): string[] {
  return [...new Set(values.filter((value): value is string => !!value))]
}
