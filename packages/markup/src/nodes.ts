import { type TagName, toTagName } from "./tag-name.js";

/** A name/value pair owned by exactly one element */
export interface Attribute {
  readonly name: string;
  readonly value: string;
}

/** Namespace an element was parsed in; decides how its content serializes */
export type MarkupNamespace = "html" | "svg" | "mathml";

export interface ElementNode {
  readonly kind: "element";
  readonly tagName: TagName;
  readonly namespace: MarkupNamespace;
  readonly attributes: readonly Attribute[];
  readonly children: readonly MarkupNode[];
}

export interface TextNode {
  readonly kind: "text";
  readonly value: string;
}

/** Character data kept verbatim (script and style bodies); never reparsed as markup */
export interface RawDataNode {
  readonly kind: "raw-data";
  readonly value: string;
}

export type OtherNodeType = "comment" | "doctype" | "processing-instruction";

/** Comments, doctypes and processing instructions. Opaque to the cleaner. */
export interface OtherNode {
  readonly kind: "other";
  readonly type: OtherNodeType;
  readonly value: string;
}

export type MarkupNode = ElementNode | TextNode | RawDataNode | OtherNode;

export type MarkupNodeKind = MarkupNode["kind"];

export function attribute(name: string, value = ""): Attribute {
  const attr: Attribute = { name, value };
  return Object.freeze(attr);
}

/**
 * Create a frozen element. Attributes are given either as a list (order kept)
 * or as a record. Without a namespace, `svg` and `math` open their foreign
 * namespaces and everything else is HTML.
 */
export function element(
  tagName: string,
  attributes: readonly Attribute[] | Readonly<Record<string, string>> = [],
  children: readonly MarkupNode[] = [],
  namespace?: MarkupNamespace,
): ElementNode {
  const name = toTagName(tagName);
  const attrs = isAttributeList(attributes)
    ? attributes
    : Object.entries(attributes).map(([key, value]) => attribute(key, value));
  const node: ElementNode = {
    kind: "element",
    tagName: name,
    namespace: namespace ?? (name === "svg" ? "svg" : name === "math" ? "mathml" : "html"),
    attributes: Object.freeze([...attrs]),
    children: Object.freeze([...children]),
  };
  return Object.freeze(node);
}

export function text(value: string): TextNode {
  const node: TextNode = { kind: "text", value };
  return Object.freeze(node);
}

export function rawData(value: string): RawDataNode {
  const node: RawDataNode = { kind: "raw-data", value };
  return Object.freeze(node);
}

function other(type: OtherNodeType, value: string): OtherNode {
  const node: OtherNode = { kind: "other", type, value };
  return Object.freeze(node);
}

export function comment(value: string): OtherNode {
  return other("comment", value);
}

export function doctype(name: string): OtherNode {
  return other("doctype", name);
}

export function processingInstruction(value: string): OtherNode {
  return other("processing-instruction", value);
}

export function isElement(node: MarkupNode): node is ElementNode {
  return node.kind === "element";
}

/** Value of the first attribute with the given name, if any */
export function getAttribute(el: ElementNode, name: string): string | undefined {
  return el.attributes.find((attr) => attr.name === name)?.value;
}

/** Direct element children with the given tag name */
export function childElements(el: ElementNode, tagName?: string): readonly ElementNode[] {
  return el.children.filter(
    (child): child is ElementNode =>
      child.kind === "element" && (tagName === undefined || child.tagName === tagName),
  );
}

function isAttributeList(
  value: readonly Attribute[] | Readonly<Record<string, string>>,
): value is readonly Attribute[] {
  return Array.isArray(value);
}
