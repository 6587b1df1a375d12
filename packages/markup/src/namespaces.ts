/**
 * Where an element lands when its serialized form is parsed again.
 *
 * A cleaned tree is only as safe as the tree the browser builds from its
 * serialization. Moving an element under a new parent can change the
 * namespace the tokenizer puts it in (an HTML `style` under `svg` becomes an
 * SVG `style` whose content is markup), or make it impossible to nest at
 * all. `childNamespace` follows the tree-construction dispatch rules for
 * foreign content to say which namespace a child start tag ends up in.
 */

import type { ElementNode, MarkupNamespace } from "./nodes.js";

/** HTML elements whose content the tokenizer reads as text, never as tags */
export const TEXT_ONLY_TAGS: ReadonlySet<string> = new Set([
  "iframe",
  "noembed",
  "noframes",
  "noscript",
  "plaintext",
  "script",
  "style",
  "textarea",
  "title",
  "xmp",
]);

// Start tags that close open foreign elements instead of nesting in them
const BREAKOUT_TAGS: ReadonlySet<string> = new Set([
  "b",
  "big",
  "blockquote",
  "body",
  "br",
  "center",
  "code",
  "dd",
  "div",
  "dl",
  "dt",
  "em",
  "embed",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "head",
  "hr",
  "i",
  "img",
  "li",
  "listing",
  "menu",
  "meta",
  "nobr",
  "ol",
  "p",
  "pre",
  "ruby",
  "s",
  "small",
  "span",
  "strike",
  "strong",
  "sub",
  "sup",
  "table",
  "tt",
  "u",
  "ul",
  "var",
]);

const FONT_BREAKOUT_ATTRIBUTES: ReadonlySet<string> = new Set(["color", "face", "size"]);

const SVG_HTML_INTEGRATION_POINTS: ReadonlySet<string> = new Set(["desc", "foreignobject", "title"]);

const MATHML_TEXT_INTEGRATION_POINTS: ReadonlySet<string> = new Set(["mi", "mn", "mo", "ms", "mtext"]);

const HTML_ANNOTATION_ENCODINGS: ReadonlySet<string> = new Set(["application/xhtml+xml", "text/html"]);

/**
 * Namespace `child` gets when its start tag is parsed with `parent` as the
 * current node, or `undefined` when it cannot be parsed as a child of
 * `parent` at all.
 */
export function childNamespace(parent: ElementNode, child: ElementNode): MarkupNamespace | undefined {
  switch (parent.namespace) {
    case "html":
      return TEXT_ONLY_TAGS.has(parent.tagName) ? undefined : htmlNamespaceFor(child);
    case "svg":
      if (SVG_HTML_INTEGRATION_POINTS.has(parent.tagName)) return htmlNamespaceFor(child);
      return breaksOut(child) ? undefined : "svg";
    case "mathml":
      if (MATHML_TEXT_INTEGRATION_POINTS.has(parent.tagName)) {
        return child.tagName === "mglyph" || child.tagName === "malignmark"
          ? "mathml"
          : htmlNamespaceFor(child);
      }
      if (parent.tagName === "annotation-xml") {
        if (child.tagName === "svg" || isHtmlAnnotation(parent)) return htmlNamespaceFor(child);
      }
      return breaksOut(child) ? undefined : "mathml";
  }
}

function htmlNamespaceFor(child: ElementNode): MarkupNamespace {
  if (child.tagName === "svg") return "svg";
  if (child.tagName === "math") return "mathml";
  return "html";
}

function breaksOut(child: ElementNode): boolean {
  if (BREAKOUT_TAGS.has(child.tagName)) return true;
  return (
    child.tagName === "font" &&
    child.attributes.some((attr) => FONT_BREAKOUT_ATTRIBUTES.has(attr.name.toLowerCase()))
  );
}

function isHtmlAnnotation(el: ElementNode): boolean {
  const encoding = el.attributes.find((attr) => attr.name.toLowerCase() === "encoding");
  return encoding !== undefined && HTML_ANNOTATION_ENCODINGS.has(encoding.value.toLowerCase());
}
