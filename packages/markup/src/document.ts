import { childElements, type ElementNode, element, type MarkupNode } from "./nodes.js";

/**
 * A parsed document. Only the `<body>` region is subject to cleaning; the
 * `<head>` matters only to validity checks.
 */
export interface MarkupDocument {
  readonly kind: "document";
  readonly baseUri: string;
  readonly children: readonly MarkupNode[];
}

export function createDocument(baseUri: string, children: readonly MarkupNode[]): MarkupDocument {
  const doc: MarkupDocument = {
    kind: "document",
    baseUri,
    children: Object.freeze([...children]),
  };
  return Object.freeze(doc);
}

/**
 * Create an empty `<html><head></head><body></body></html>` shell. When a body
 * is given it takes the place of the empty one.
 */
export function createShell(baseUri = "", body?: ElementNode): MarkupDocument {
  return createDocument(baseUri, [element("html", [], [element("head"), body ?? element("body")])]);
}

/** The root `<html>` element */
export function documentElement(doc: MarkupDocument): ElementNode | undefined {
  return doc.children.find(
    (child): child is ElementNode => child.kind === "element" && child.tagName === "html",
  );
}

export function documentHead(doc: MarkupDocument): ElementNode | undefined {
  const root = documentElement(doc);
  return root ? childElements(root, "head")[0] : undefined;
}

/** The `<body>` element, or undefined for frameset documents */
export function documentBody(doc: MarkupDocument): ElementNode | undefined {
  const root = documentElement(doc);
  return root ? childElements(root, "body")[0] : undefined;
}
