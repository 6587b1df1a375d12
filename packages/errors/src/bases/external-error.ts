import { SieveError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
} from "../catalog.js";
import type { SieveErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors raised by collaborators the caller plugs in (policies, parsers).
 * The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode = "EXTERNAL_DEPENDENCY_FAILED"> extends SieveError {
  readonly _tag = "ExternalError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: SieveErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | SieveErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
      const code = "EXTERNAL_DEPENDENCY_FAILED" as C;
      const entry: ErrorCatalogEntry = ERROR_CATALOG[code];
      this.code = code;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    } else {
      const opts = messageOrOptions;
      super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
      const entry: ErrorCatalogEntry = ERROR_CATALOG[opts.code];
      this.code = opts.code;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    }
  }
}
