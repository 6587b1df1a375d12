import { SanitizeContentBlockedError } from "@sieve/errors";
import {
  createShell,
  documentBody,
  documentHead,
  type ElementNode,
  element,
  type FragmentParseResult,
  htmlParser,
  innerHtml,
  type MarkupDocument,
  type MarkupParser,
  type ParseError,
} from "@sieve/markup";
import { requireArgument } from "./arguments.js";
import { CleanerConfigSchema, parseConfig, type ResolvedCleanerConfig } from "./config.js";
import { type CleanerOperation, recordCleaning } from "./metrics.js";
import { copySafeNodes } from "./traversal.js";
import type {
  CleanerConfig,
  CleaningResult,
  DocumentCleaningResult,
  PolicyOracle,
} from "./types.js";

const LOG_PREFIX = "[sieve/cleaner]";

/**
 * Cleans untrusted documents and body fragments against a policy.
 *
 * Only the body is cleaned; the head of an input document is never copied.
 * One Cleaner (and its policy) may serve any number of calls.
 */
export class Cleaner {
  private readonly config: ResolvedCleanerConfig;
  private readonly parser: MarkupParser;

  constructor(
    private readonly policy: PolicyOracle,
    config?: CleanerConfig,
  ) {
    requireArgument(policy, "policy");
    this.config = parseConfig(CleanerConfigSchema, config, "cleaner");
    this.parser = this.config.parser ?? htmlParser;
  }

  /**
   * Clean a document's body into a fresh shell that keeps the input's base URI.
   * A document without a body cleans to an empty body.
   */
  clean(document: MarkupDocument): DocumentCleaningResult {
    requireArgument(document, "document");
    const start = performance.now();
    const result = this.cleanDocument(document);
    recordCleaning("clean", result, performance.now() - start);
    return result;
  }

  /**
   * True when cleaning removes nothing and the head is empty.
   * A document without a body is never valid.
   */
  isValid(document: MarkupDocument): boolean {
    requireArgument(document, "document");
    const start = performance.now();
    const body = documentBody(document);
    if (body === undefined) {
      return false;
    }
    const result = copySafeNodes(body, element("body"), this.policy);
    recordCleaning("is_valid", result, performance.now() - start);
    const head = documentHead(document);
    return result.removedCount === 0 && (head === undefined || head.children.length === 0);
  }

  /**
   * True when the fragment parses without error and cleaning removes nothing.
   */
  isValidBodyHtml(html: string): boolean {
    const start = performance.now();
    const parsed = this.parseFragment(html, Math.max(1, this.config.maxParseErrors));
    const result = copySafeNodes(element("body", [], parsed.nodes), element("body"), this.policy);
    recordCleaning("is_valid_body_html", result, performance.now() - start);
    return result.removedCount === 0 && parsed.errors.length === 0;
  }

  checkForParseErrors(html: string): readonly ParseError[] {
    return this.parseFragment(html, this.config.maxParseErrors).errors;
  }

  /**
   * Parse a body fragment and clean it into a fresh document shell.
   */
  cleanBodyHtml(html: string, baseUri = ""): DocumentCleaningResult {
    return this.cleanFragment(html, baseUri, "clean_body_html");
  }

  /**
   * Parse and clean a body fragment, returning the cleaned markup.
   */
  cleanHtml(html: string): string {
    return innerHtml(this.cleanFragment(html, "", "clean_html").root);
  }

  private cleanDocument(document: MarkupDocument): DocumentCleaningResult {
    let body = documentBody(document);
    if (body === undefined) {
      console.warn(`${LOG_PREFIX} Document has no body; cleaning to an empty body`);
      body = element("body");
    }
    return this.withShell(copySafeNodes(body, element("body"), this.policy), document.baseUri);
  }

  private cleanFragment(
    html: string,
    baseUri: string,
    operation: CleanerOperation,
  ): DocumentCleaningResult {
    const start = performance.now();
    const parsed = this.parseFragment(html, this.config.maxParseErrors);
    const dirty: ElementNode = element("body", [], parsed.nodes);
    const result = this.withShell(copySafeNodes(dirty, element("body"), this.policy), baseUri);
    recordCleaning(operation, result, performance.now() - start);
    return result;
  }

  private parseFragment(html: string, maxErrors: number): FragmentParseResult {
    requireArgument(html, "html");
    if (html.length > this.config.maxInputLength) {
      throw new SanitizeContentBlockedError(
        "Markup exceeds maximum input length",
        html.length,
        this.config.maxInputLength,
      );
    }
    return this.parser.parseBodyFragment(html, { maxErrors });
  }

  private withShell(result: CleaningResult, baseUri: string): DocumentCleaningResult {
    const cleaned: DocumentCleaningResult = {
      ...result,
      document: createShell(baseUri, result.root),
    };
    return Object.freeze(cleaned);
  }
}
