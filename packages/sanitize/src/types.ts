import type {
  Attribute,
  ElementNode,
  MarkupDocument,
  MarkupNode,
  MarkupParser,
  TagName,
} from "@sieve/markup";

/**
 * The safety oracle consulted for every node and attribute.
 * Implementations must be side-effect free: one instance is shared by every
 * traversal that uses it.
 */
export interface PolicyOracle {
  isSafeTag(tagName: TagName): boolean;
  /** `element` is the source element, available for contextual rules */
  isSafeAttribute(tagName: TagName, element: ElementNode, attribute: Attribute): boolean;
  /** Attributes always set on output elements of this tag, after filtering */
  enforcedAttributes(tagName: TagName): readonly Attribute[];
}

/** Outcome of one traversal, immutable once returned */
export interface CleaningResult {
  /** Copy of the destination root holding the cleaned children */
  readonly root: ElementNode;
  /** Source nodes with no counterpart in the output, in discovery order */
  readonly removedNodes: readonly MarkupNode[];
  /** Attributes dropped from elements that were kept, in discovery order */
  readonly removedAttributes: readonly Attribute[];
  readonly removedCount: number;
  /** True when nothing had to be removed */
  readonly safe: boolean;
}

export interface DocumentCleaningResult extends CleaningResult {
  /** Fresh document shell whose body is `root` */
  readonly document: MarkupDocument;
}

/** Configuration for Cleaner */
export interface CleanerConfig {
  readonly maxInputLength?: number;
  /** Parse errors tracked per fragment; `isValidBodyHtml` always tracks at least one */
  readonly maxParseErrors?: number;
  readonly parser?: MarkupParser;
}

/**
 * Declarative allow-list. Tags named as keys of `attributes` (other than
 * `:all`) or of `enforcedAttributes` are permitted even when absent from `tags`.
 */
export interface AllowListConfig {
  readonly tags?: readonly string[];
  /** Tag → permitted attribute names; `:all` applies to every permitted tag */
  readonly attributes?: Readonly<Record<string, readonly string[]>>;
  /** Tag → attribute name → value always set on output */
  readonly enforcedAttributes?: Readonly<Record<string, Readonly<Record<string, string>>>>;
  /** Tag → attribute → permitted URL schemes (without the trailing colon) */
  readonly protocols?: Readonly<Record<string, Readonly<Record<string, readonly string[]>>>>;
  /** Let scheme-less values through protocol-restricted attributes */
  readonly preserveRelativeLinks?: boolean;
}
