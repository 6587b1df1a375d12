/** 1MB bound on markup strings the cleaner will parse */
export const DEFAULT_MAX_INPUT_LENGTH = 1_048_576;

/** Key in the allow-list attribute map that applies to every permitted tag */
export const ALL_TAGS = ":all";
