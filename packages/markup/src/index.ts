export const PACKAGE_NAME = "@sieve/markup" as const;

// Constants
export { DEFAULT_MAX_PARSE_ERRORS, RAW_DATA_TAGS } from "./constants.js";

// Documents
export {
  createDocument,
  createShell,
  documentBody,
  documentElement,
  documentHead,
  type MarkupDocument,
} from "./document.js";

// Namespaces
export { childNamespace, TEXT_ONLY_TAGS } from "./namespaces.js";

// Nodes
export {
  type Attribute,
  attribute,
  childElements,
  comment,
  doctype,
  type ElementNode,
  element,
  getAttribute,
  isElement,
  type MarkupNamespace,
  type MarkupNode,
  type MarkupNodeKind,
  type OtherNode,
  type OtherNodeType,
  processingInstruction,
  type RawDataNode,
  rawData,
  type TextNode,
  text,
} from "./nodes.js";

// Parsing
export {
  type FragmentParseResult,
  htmlParser,
  type MarkupParser,
  type ParseDocumentOptions,
  type ParseError,
  type ParseFragmentOptions,
  parseBodyFragment,
  parseDocument,
} from "./parser.js";

// Serialization
export { innerHtml, toHtml } from "./serializer.js";

// Tag names
export { type TagName, toTagName } from "./tag-name.js";
