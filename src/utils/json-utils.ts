// Centralized JSON handling so log writes and error-body parsing never throw.

/**
 * Parse a JSON string, returning `fallback` when the text is not valid JSON.
 */
export const safeJsonParse = (jsonString: string, fallback: unknown = null): unknown => {
  try {
    return JSON.parse(jsonString) as unknown;
  } catch {
    return fallback;
  }
};

/**
 * Stringify a value, returning an empty string for values JSON cannot represent
 * (circular structures, BigInt).
 */
export const safeJsonStringify = (value: unknown, space?: string | number): string => {
  try {
    return JSON.stringify(value, null, space) ?? '';
  } catch (error) {
    console.error('Failed to stringify value:', error);
    return '';
  }
};
