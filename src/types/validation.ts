/**
 * Ensures a value is defined, throwing otherwise.
 *
 * @param value - Value that may be undefined
 * @param name - Name used in the error message
 * @returns The value, narrowed to exclude undefined
 */
export function ensureDefined<T>(value: T | undefined | null, name: string): T {
  if (value === undefined || value === null) {
    throw new Error(`Expected ${name} to be defined`)
  }
  return value
}
