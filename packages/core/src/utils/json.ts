/**
 * JSON column helpers
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parse a TEXT column expected to hold a JSON object; anything else yields {}
 */
export function parseJsonObject(text: string | null | undefined): Record<string, unknown> {
  if (!text) {
    return {};
  }
  const parsed: unknown = JSON.parse(text);
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Parse a nullable JSON TEXT column
 */
export function parseJsonNullable(text: string | null | undefined): unknown {
  if (text === null || text === undefined) {
    return null;
  }
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

/**
 * Serialize for a nullable JSON TEXT column
 */
export function toJsonColumn(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}
