/**
 * Type Guards
 */

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isPositiveInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value) && value > 0;
}

/**
 * Split a free-form option string into argument tokens
 */
export function splitTokens(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/\s+/).filter((token) => token.length > 0);
}
