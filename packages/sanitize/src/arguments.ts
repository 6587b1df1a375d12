import { SanitizeInvalidArgumentError } from "@sieve/errors";

/** Reject a missing caller-supplied argument before any work starts */
export function requireArgument(value: unknown, name: string): void {
  if (value === null || value === undefined) {
    throw new SanitizeInvalidArgumentError(name);
  }
}
