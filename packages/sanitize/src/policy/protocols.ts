/**
 * Strip control characters and whitespace before a scheme check.
 * Browsers ignore tabs and newlines inside URLs, so `java\tscript:` must be
 * read as `javascript:`.
 */
export function normalizeUrl(raw: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: intentionally stripping control chars from URLs
  return raw.replace(/[\x00-\x1f\x7f]/g, "").replace(/[\s]+/g, "");
}

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;

/**
 * Lower-cased scheme of an attribute value without the trailing colon, or
 * undefined for relative references.
 */
export function extractScheme(raw: string): string | undefined {
  const normalized = normalizeUrl(raw);
  try {
    const url = new URL(normalized);
    return url.protocol.slice(0, -1).toLowerCase();
  } catch {
    return SCHEME_PATTERN.exec(normalized)?.[1]?.toLowerCase();
  }
}
