export const PACKAGE_NAME = "@sieve/sanitize" as const;

// Constants
export { ALL_TAGS, DEFAULT_MAX_INPUT_LENGTH } from "./constants.js";

// Configuration
export {
  AllowListConfigSchema,
  CleanerConfigSchema,
  parseConfig,
  type ResolvedAllowListConfig,
  type ResolvedCleanerConfig,
} from "./config.js";

// Core
export { Cleaner } from "./cleaner.js";
export { CleaningLedger } from "./result.js";
export { copySafeNodes } from "./traversal.js";

// Metrics
export {
  type CleanerOperation,
  getCleanDuration,
  getRemovedAttributesCounter,
  getRemovedNodesCounter,
  METER_NAME,
  recordCleaning,
} from "./metrics.js";

// Policy
export { AllowListPolicy, extractScheme, normalizeUrl } from "./policy/index.js";

// Types
export type {
  AllowListConfig,
  CleanerConfig,
  CleaningResult,
  DocumentCleaningResult,
  PolicyOracle,
} from "./types.js";
