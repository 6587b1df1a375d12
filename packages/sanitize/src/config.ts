/**
 * Zod schemas for cleaner and allow-list configuration.
 */

import { SanitizeConfigurationError, type ValidationIssue } from "@sieve/errors";
import type { MarkupParser } from "@sieve/markup";
import { z } from "zod";
import { DEFAULT_MAX_INPUT_LENGTH } from "./constants.js";

const NAME_MESSAGE = "must be non-empty and free of whitespace, quotes, '/', '=', '>' and NUL";
// biome-ignore lint/suspicious/noControlCharactersInRegex: NUL is never a valid name character
const NAME_PATTERN = /^[^\s"'/=>\x00]+$/;

const NameSchema = z.string().trim().regex(NAME_PATTERN, NAME_MESSAGE).toLowerCase();

const SchemeSchema = z
  .string()
  .trim()
  .regex(/^[a-z][a-z0-9+.-]*$/i, "must be a URL scheme without the trailing ':'")
  .toLowerCase();

const MarkupParserSchema = z.custom<MarkupParser>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "parseBodyFragment" in value &&
    typeof value.parseBodyFragment === "function",
  { message: "parser must implement parseBodyFragment()" },
);

export const CleanerConfigSchema = z
  .object({
    maxInputLength: z.number().int().positive().default(DEFAULT_MAX_INPUT_LENGTH),
    maxParseErrors: z.number().int().min(0).default(1),
    parser: MarkupParserSchema.optional(),
  })
  .strict();

export const AllowListConfigSchema = z
  .object({
    tags: z.array(NameSchema).default([]),
    attributes: z.record(NameSchema, z.array(NameSchema)).default({}),
    enforcedAttributes: z.record(NameSchema, z.record(NameSchema, z.string())).default({}),
    protocols: z.record(NameSchema, z.record(NameSchema, z.array(SchemeSchema))).default({}),
    preserveRelativeLinks: z.boolean().default(false),
  })
  .strict();

export type ResolvedCleanerConfig = z.infer<typeof CleanerConfigSchema>;
export type ResolvedAllowListConfig = z.infer<typeof AllowListConfigSchema>;

/**
 * Validate input against a schema, converting failures into a
 * SanitizeConfigurationError listing every `path: message` issue.
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    const summary = issues.map((i) => `${i.field || "(root)"}: ${i.message}`).join("; ");
    throw new SanitizeConfigurationError(`Invalid ${label} configuration: ${summary}`, issues);
  }
  return result.data;
}
