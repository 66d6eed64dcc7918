/**
 * JSON value and schema types shared across the SDK.
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JSONValue = string | number | boolean | null | { [key: string]: JSONValue } | JSONValue[]

/**
 * A JSON object, the only shape a tool call input may take.
 */
export type JSONObject = { [key: string]: JSONValue }

/**
 * JSON Schema describing a tool's input.
 * Only the keywords the engine reads are typed, everything else passes through untouched.
 */
export interface JSONSchema {
  type?: string | string[]
  description?: string
  properties?: Record<string, unknown>
  required?: string[]
  [keyword: string]: unknown
}

/**
 * Narrows an unknown value to a JSON object (not an array, not null).
 *
 * @param value - Value to test
 * @returns True when the value is a plain JSON object
 */
export function isJSONObject(value: unknown): value is JSONObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
