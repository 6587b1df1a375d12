/**
 * HTML parsing backed by parse5.
 *
 * parse5 implements the WHATWG tree-construction algorithm, so every input
 * string produces a tree; malformed syntax is reported through
 * `onParseError` rather than thrown. The parse5 tree is converted into the
 * frozen MarkupNode variant before anything else sees it.
 */

import {
  type DefaultTreeAdapterMap,
  defaultTreeAdapter,
  html,
  type ParserError,
  parse,
  parseFragment,
} from "parse5";
import { DEFAULT_MAX_PARSE_ERRORS, RAW_DATA_TAGS } from "./constants.js";
import { createDocument, type MarkupDocument } from "./document.js";
import {
  type Attribute,
  attribute,
  comment,
  doctype,
  element,
  type MarkupNamespace,
  type MarkupNode,
  rawData,
  text,
} from "./nodes.js";

type Parse5ChildNode = DefaultTreeAdapterMap["childNode"];
type Parse5Element = DefaultTreeAdapterMap["element"];
type Parse5Template = DefaultTreeAdapterMap["template"];

/** A syntax problem reported by the tokenizer or tree builder */
export interface ParseError {
  readonly code: string;
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export interface ParseDocumentOptions {
  readonly baseUri?: string;
}

export interface ParseFragmentOptions {
  /** Stop recording after this many errors; 0 disables tracking */
  readonly maxErrors?: number;
}

export interface FragmentParseResult {
  readonly nodes: readonly MarkupNode[];
  readonly errors: readonly ParseError[];
}

/** The parsing capability the cleaner depends on */
export interface MarkupParser {
  parseBodyFragment(markup: string, options?: ParseFragmentOptions): FragmentParseResult;
}

/**
 * Parse a complete HTML document. Missing `<html>`, `<head>` and `<body>`
 * elements are synthesized, as a browser would.
 */
export function parseDocument(markup: string, options?: ParseDocumentOptions): MarkupDocument {
  const parsed = parse(markup);
  return createDocument(options?.baseUri ?? "", convertChildren(parsed.childNodes, false));
}

/**
 * Parse markup as the contents of a `<body>` element and collect up to
 * `maxErrors` parse errors.
 */
export function parseBodyFragment(
  markup: string,
  options?: ParseFragmentOptions,
): FragmentParseResult {
  const maxErrors = options?.maxErrors ?? DEFAULT_MAX_PARSE_ERRORS;
  const errors: ParseError[] = [];
  const onParseError =
    maxErrors > 0
      ? (err: ParserError): void => {
          if (errors.length < maxErrors) {
            errors.push({
              code: err.code,
              offset: err.startOffset,
              line: err.startLine,
              column: err.startCol,
            });
          }
        }
      : null;

  const context = defaultTreeAdapter.createElement("body", html.NS.HTML, []);
  const fragment = parseFragment(context, markup, { onParseError });
  return {
    nodes: convertChildren(fragment.childNodes, false),
    errors,
  };
}

/** Default parser used by the cleaner */
export const htmlParser: MarkupParser = { parseBodyFragment };

function convertChildren(nodes: readonly Parse5ChildNode[], rawDataParent: boolean): MarkupNode[] {
  const converted: MarkupNode[] = [];
  for (const node of nodes) {
    const result = convertNode(node, rawDataParent);
    if (result) converted.push(result);
  }
  return converted;
}

function convertNode(node: Parse5ChildNode, rawDataParent: boolean): MarkupNode | undefined {
  if (defaultTreeAdapter.isElementNode(node)) {
    const source = isTemplate(node) ? node.content.childNodes : node.childNodes;
    const attributes: Attribute[] = node.attrs.map((attr) =>
      attribute(attr.prefix ? `${attr.prefix}:${attr.name}` : attr.name, attr.value),
    );
    const namespace = toMarkupNamespace(node.namespaceURI);
    // Foreign `style` and `script` hold entity-decoded text, not raw data
    const holdsRawData = namespace === "html" && RAW_DATA_TAGS.has(node.tagName.toLowerCase());
    return element(node.tagName, attributes, convertChildren(source, holdsRawData), namespace);
  }
  if (defaultTreeAdapter.isTextNode(node)) {
    return rawDataParent ? rawData(node.value) : text(node.value);
  }
  if (defaultTreeAdapter.isCommentNode(node)) {
    return comment(node.data);
  }
  if (defaultTreeAdapter.isDocumentTypeNode(node)) {
    return doctype(node.name);
  }
  return undefined;
}

function toMarkupNamespace(uri: string): MarkupNamespace {
  if (uri === html.NS.SVG) return "svg";
  if (uri === html.NS.MATHML) return "mathml";
  return "html";
}

function isTemplate(node: Parse5Element): node is Parse5Template {
  return node.tagName === "template" && "content" in node;
}
