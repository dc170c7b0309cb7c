/**
 * Relative URL handling for URL-bearing categories
 */

import { MalformedInputError } from './errors';

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:/i;

/**
 * True when the value carries its own scheme (http:, https:, data:, mailto:, ...)
 */
export function isAbsoluteUrl(value: string): boolean {
  return SCHEME_PATTERN.test(value);
}

/**
 * Resolve a relative reference against the page it came from.
 * Absolute candidates and empty strings are returned as they are.
 */
export function resolveUrl(candidate: string, sourceUrl: string): string {
  if (candidate === '' || isAbsoluteUrl(candidate)) return candidate;

  try {
    return new URL(candidate, sourceUrl).toString();
  } catch {
    // Unparseable reference stays as the technique reported it
    return candidate;
  }
}

/**
 * Validate an optional source URL; blank means none was supplied
 */
export function parseSourceUrl(value: string | null | undefined): string | null {
  if (value == null || value.trim() === '') return null;

  const trimmed = value.trim();
  if (!isAbsoluteUrl(trimmed)) {
    throw new MalformedInputError(`Source URL must be absolute: "${value}"`);
  }

  try {
    return new URL(trimmed).toString();
  } catch (error) {
    throw new MalformedInputError(`Invalid source URL: "${value}"`, { cause: error });
  }
}
