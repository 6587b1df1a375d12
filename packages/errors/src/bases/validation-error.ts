import { SieveError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
} from "../catalog.js";
import type { SieveErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input, configuration, or request data.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = "VALIDATION_FAILED"> extends SieveError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (populated for configuration failures) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: SieveErrorOptions<C> & { issues?: readonly ValidationIssue[] });
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | (SieveErrorOptions<C> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      const code = "VALIDATION_FAILED" as C;
      const entry: ErrorCatalogEntry = ERROR_CATALOG[code];
      this.code = code;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
      this.issues = issues ?? [];
    } else {
      const opts = messageOrOptions;
      super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
      const entry: ErrorCatalogEntry = ERROR_CATALOG[opts.code];
      this.code = opts.code;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
      this.issues = opts.issues ?? [];
    }
  }
}
