/**
 * Case-insensitive helpers over plain header records.
 */

export const AUTHORIZATION_HEADER = 'Authorization';

/**
 * Returns the header value with case-insensitive lookup, or undefined.
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }

  return undefined;
}

/**
 * True when the header is present with a non-empty value.
 */
export function hasHeader(headers: Record<string, string>, name: string): boolean {
  const value = getHeader(headers, name);
  return value !== undefined && value !== '';
}

/**
 * Sets a header, replacing any existing entry that differs only in case.
 */
export function setHeader(headers: Record<string, string>, name: string, value: string): void {
  deleteHeader(headers, name);
  headers[name] = value;
}

/**
 * Removes every entry matching the name case-insensitively.
 */
export function deleteHeader(headers: Record<string, string>, name: string): void {
  const lowerName = name.toLowerCase();

  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lowerName) {
      delete headers[key];
    }
  }
}

/**
 * Formats a bearer authorization value.
 */
export function bearer(token: string): string {
  return `Bearer ${token}`;
}
