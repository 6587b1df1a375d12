/** HTML-namespace elements whose character content is kept as raw data instead of text */
export const RAW_DATA_TAGS: ReadonlySet<string> = new Set(["script", "style"]);

/** Parse errors tracked per fragment unless the caller asks for more */
export const DEFAULT_MAX_PARSE_ERRORS = 1;
