import { escapeText } from "entities";
import { type DefaultTreeAdapterMap, defaultTreeAdapter, html, serialize } from "parse5";
import type { MarkupDocument } from "./document.js";
import type { ElementNode, MarkupNamespace, MarkupNode } from "./nodes.js";

type Parse5ParentNode = DefaultTreeAdapterMap["parentNode"];
type Parse5Element = DefaultTreeAdapterMap["element"];
type Parse5DocumentType = DefaultTreeAdapterMap["documentType"];

// HTML elements whose text the serializer writes without escaping
const VERBATIM_TEXT_TAGS: ReadonlySet<string> = new Set([
  "iframe",
  "noembed",
  "noframes",
  "noscript",
  "script",
  "style",
  "xmp",
]);

const NAMESPACE_URIS: Readonly<Record<MarkupNamespace, html.NS>> = {
  html: html.NS.HTML,
  svg: html.NS.SVG,
  mathml: html.NS.MATHML,
};

/**
 * Serialize a node (outer HTML) or a whole document.
 * Character data under HTML `script`, `style` and the other raw-text elements
 * is emitted verbatim unless it would close its element early; all other
 * text is escaped.
 */
export function toHtml(node: MarkupNode | MarkupDocument): string {
  if (node.kind === "document") {
    const doc = defaultTreeAdapter.createDocument();
    for (const child of node.children) appendTo(doc, child, undefined);
    return serialize(doc);
  }
  const fragment = defaultTreeAdapter.createDocumentFragment();
  appendTo(fragment, node, undefined);
  return serialize(fragment);
}

/** Serialize the children of an element */
export function innerHtml(el: ElementNode): string {
  return serialize(buildElement(el));
}

function appendTo(parent: Parse5ParentNode, node: MarkupNode, owner: ElementNode | undefined): void {
  switch (node.kind) {
    case "element":
      defaultTreeAdapter.appendChild(parent, buildElement(node));
      return;
    case "text":
    case "raw-data":
      defaultTreeAdapter.insertText(parent, verbatimSafe(node.value, owner));
      return;
    case "other":
      if (node.type === "doctype") {
        const doctypeNode: Parse5DocumentType = {
          nodeName: "#documentType",
          name: node.value,
          publicId: "",
          systemId: "",
          parentNode: null,
        };
        defaultTreeAdapter.appendChild(parent, doctypeNode);
      } else {
        // HTML has no processing instructions; they round-trip as bogus comments
        const data = node.type === "processing-instruction" ? `?${node.value}` : node.value;
        defaultTreeAdapter.appendChild(parent, defaultTreeAdapter.createCommentNode(data));
      }
      return;
  }
}

function buildElement(node: ElementNode): Parse5Element {
  const el = defaultTreeAdapter.createElement(
    node.tagName,
    NAMESPACE_URIS[node.namespace],
    node.attributes.map((attr) => ({ name: attr.name, value: attr.value })),
  );
  let target: Parse5ParentNode = el;
  if (node.namespace === "html" && node.tagName === "template") {
    const content = defaultTreeAdapter.createDocumentFragment();
    defaultTreeAdapter.setTemplateContent(el, content);
    target = content;
  }
  for (const child of node.children) appendTo(target, child, node);
  return el;
}

/**
 * Text the serializer will write verbatim must not contain its element's end
 * tag; such text is escaped instead.
 */
function verbatimSafe(value: string, owner: ElementNode | undefined): string {
  if (owner === undefined || owner.namespace !== "html" || !VERBATIM_TEXT_TAGS.has(owner.tagName)) {
    return value;
  }
  return value.toLowerCase().includes(`</${owner.tagName}`) ? escapeText(value) : value;
}
