import { ExternalError } from "./bases/external-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ============================================================================
// SANITIZE ERRORS
// ============================================================================

/**
 * Thrown when a cleaner or allow-list policy configuration fails validation
 */
export class SanitizeConfigurationError extends ValidationError<"SANITIZE_CONFIGURATION_INVALID"> {
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "SANITIZE_CONFIGURATION_INVALID",
      message,
      metadata,
      traceId,
      ...(issues ? { issues } : {}),
    });
  }
}

/**
 * Thrown before any work when a caller omits the document, element or policy
 */
export class SanitizeInvalidArgumentError extends ValidationError<"SANITIZE_INVALID_ARGUMENT"> {
  constructor(
    public readonly argument: string,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "SANITIZE_INVALID_ARGUMENT",
      message: `Argument '${argument}' must not be null or undefined`,
      metadata,
      traceId,
    });
  }
}

/**
 * Thrown when markup handed to the cleaner exceeds the configured length bound
 */
export class SanitizeContentBlockedError extends ValidationError<"SANITIZE_CONTENT_BLOCKED"> {
  constructor(
    public readonly reason: string,
    public readonly contentLength: number,
    public readonly maxLength: number,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "SANITIZE_CONTENT_BLOCKED",
      message: `Content blocked: ${reason} (length: ${contentLength}, max: ${maxLength})`,
      metadata,
      traceId,
    });
  }
}

/**
 * Thrown when a policy oracle throws while answering a safety query
 */
export class SanitizePolicyFailedError extends ExternalError<"SANITIZE_POLICY_FAILED"> {
  constructor(
    public readonly method: string,
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    cause?: Error,
  ) {
    super({
      code: "SANITIZE_POLICY_FAILED",
      message: `Policy method '${method}' failed: ${message}`,
      metadata,
      traceId,
      ...(cause ? { cause } : {}),
    });
  }
}

// ============================================================================
// MARKUP ERRORS
// ============================================================================

/**
 * Thrown when a tag name is empty or contains characters no parser would emit
 */
export class MarkupTagNameError extends ValidationError<"MARKUP_INVALID_TAG_NAME"> {
  constructor(
    public readonly tagName: string,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "MARKUP_INVALID_TAG_NAME",
      message: `Invalid tag name: ${JSON.stringify(tagName)}`,
      metadata,
      traceId,
    });
  }
}
