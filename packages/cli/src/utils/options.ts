/**
 * Option value parsers for commander
 */

import { InvalidArgumentError } from 'commander'
import type { HttpMethod, JsonPrimitive } from '@amee-client/core'

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE']

/**
 * Accumulate repeatable `key=value` options into one record
 *
 * @example
 * ```typescript
 * .option('-c, --choice <key=value>', 'Drill choice', collectPair, {})
 * ```
 */
export function collectPair(
  value: string,
  previous: Record<string, string>
): Record<string, string> {
  const index = value.indexOf('=')
  if (index <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${value}'.`)
  }
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) }
}

/**
 * Turn numeric and boolean strings into JSON numbers and booleans
 */
export function coerceValues(pairs: Record<string, string>): Record<string, JsonPrimitive> {
  const values: Record<string, JsonPrimitive> = {}
  for (const [key, raw] of Object.entries(pairs)) {
    if (/^-?\d+(\.\d+)?$/.test(raw)) {
      values[key] = Number(raw)
    } else if (raw === 'true' || raw === 'false') {
      values[key] = raw === 'true'
    } else {
      values[key] = raw
    }
  }
  return values
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value)
}
