/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * True for strings made only of ASCII digits ("1200", not "12.5" or "N/A")
 */
export function isDigitString(value: unknown): value is string {
  return isString(value) && /^\d+$/.test(value);
}
