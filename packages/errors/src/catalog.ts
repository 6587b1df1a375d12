/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the sieve packages.
 * Each error code maps to a base error type from the behavioral hierarchy.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: validation, external, sanitize, markup
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ExternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // VALIDATION ERRORS - Generic input validation
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },

  // ============================================================================
  // EXTERNAL ERRORS - Failures inside caller-supplied collaborators
  // ============================================================================
  EXTERNAL_DEPENDENCY_FAILED: {
    domain: "external",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "External dependency failed",
    description: "A collaborator outside this package failed unexpectedly",
  },

  // ============================================================================
  // SANITIZE ERRORS: allow-list cleaning
  // ============================================================================
  SANITIZE_CONFIGURATION_INVALID: {
    domain: "sanitize",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid sanitize configuration",
    description: "The cleaner or policy configuration is invalid",
  },
  SANITIZE_INVALID_ARGUMENT: {
    domain: "sanitize",
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid argument",
    description: "A required argument was missing when calling the cleaner",
  },
  SANITIZE_CONTENT_BLOCKED: {
    domain: "sanitize",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Content blocked",
    description: "Markup was refused because it exceeds the configured size limit",
  },
  SANITIZE_POLICY_FAILED: {
    domain: "sanitize",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Policy failed",
    description: "A policy oracle threw while answering a safety query",
  },

  // ============================================================================
  // MARKUP ERRORS: node model construction
  // ============================================================================
  MARKUP_INVALID_TAG_NAME: {
    domain: "markup",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid tag name",
    description: "A tag name was empty or contained forbidden characters",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
