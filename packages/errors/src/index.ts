/**
 * @sieve/errors
 *
 * Shared error taxonomy for the sieve packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

export const PACKAGE_NAME = "@sieve/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, SieveError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, ValidationError } from "./bases/index.js";

export type {
  ExternalCodes,
  SieveErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  MarkupTagNameError,
  SanitizeConfigurationError,
  SanitizeContentBlockedError,
  SanitizeInvalidArgumentError,
  SanitizePolicyFailedError,
} from "./classes.js";
