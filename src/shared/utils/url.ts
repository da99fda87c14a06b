/**
 * URL Utilities
 *
 * File identifier resolution and link normalization.
 * Both are pure functions; the pattern table lives in constants.ts.
 */
import { FILE_ID_PATTERNS } from "../../config/constants";

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:/i;

/**
 * Extracts the file identifier from a viking page URL.
 *
 * Patterns are tried in FILE_ID_PATTERNS order and the first match wins,
 * so `https://vik1ngfile.site/file/abc?next=/f/xyz` resolves to "abc".
 *
 * @returns The identifier, or undefined when no pattern matches
 */
export function resolveFileId(url: string): string | undefined {
  for (const pattern of FILE_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

/**
 * Turns a link reference into an absolute URL against `baseOrigin`.
 * References that already carry a scheme are returned as-is, which
 * makes the function idempotent.
 */
export function normalizeLink(reference: string, baseOrigin: string): string {
  if (SCHEME_PATTERN.test(reference)) return reference;

  const origin = baseOrigin.replace(/\/+$/, "");
  if (reference.startsWith("/")) return `${origin}${reference}`;
  return `${origin}/${reference}`;
}
