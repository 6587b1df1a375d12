import { MarkupTagNameError } from "@sieve/errors";

/** Branded string type for normalized, validated tag names. */
export type TagName = string & { readonly __brand: "TagName" };

// The tokenizer ends a tag name at whitespace, "/" or ">" and replaces NUL,
// so none of these can appear in a parsed name.
const FORBIDDEN_TAG_NAME_CHARS = /[\s/>\0]/;

/**
 * Normalize a raw tag name (trim + lower-case) and validate it.
 * @throws MarkupTagNameError when the name is empty or contains forbidden characters
 */
export function toTagName(raw: string): TagName {
  const normalized = raw.trim().toLowerCase();
  if (normalized.length === 0 || FORBIDDEN_TAG_NAME_CHARS.test(normalized)) {
    throw new MarkupTagNameError(raw);
  }
  return normalized as TagName;
}
