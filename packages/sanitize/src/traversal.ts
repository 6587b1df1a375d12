/**
 * The sanitizing traversal.
 *
 * Walks an untrusted subtree depth-first and rebuilds it under a copy of the
 * destination root, keeping only what the policy approves:
 *
 * - safe element: copied with its approved attributes, then the policy's
 *   enforced attributes on top; its children attach under the copy
 * - unsafe element: recorded and unwrapped; its children attach to the
 *   nearest kept ancestor
 * - text: always copied
 * - raw data: copied only when its source parent was copied
 * - anything else: recorded, never copied
 *
 * A safe element whose namespace would change under its new parent (an SVG
 * `style` unwrapped into HTML, an HTML `style` unwrapped into SVG) is treated
 * as unsafe, so the output parses back into the tree that was built.
 *
 * The source root is a container: it is neither copied nor recorded. Each
 * stack frame carries the output element its node attaches under, so the
 * cursor is restored simply by popping back to a sibling's frame.
 */

import { getErrorMessage, SanitizePolicyFailedError } from "@sieve/errors";
import {
  type Attribute,
  attribute,
  childNamespace,
  type ElementNode,
  type MarkupNamespace,
  type MarkupNode,
  rawData,
  type TagName,
  text,
} from "@sieve/markup";
import { requireArgument } from "./arguments.js";
import { CleaningLedger } from "./result.js";
import type { CleaningResult, PolicyOracle } from "./types.js";

/** Output element under construction */
interface DraftElement {
  readonly kind: "element";
  readonly tagName: TagName;
  readonly namespace: MarkupNamespace;
  readonly attributes: Attribute[];
  readonly children: MarkupNode[];
}

interface Frame {
  readonly node: MarkupNode;
  /** Whether the source parent was copied to the output */
  readonly parentKept: boolean;
  readonly cursor: DraftElement;
}

/**
 * Copy the policy-approved content of `source` into a copy of `destination`.
 * `source` is only read.
 *
 * @throws SanitizeInvalidArgumentError when an argument is missing
 * @throws SanitizePolicyFailedError when the policy itself throws
 */
export function copySafeNodes(
  source: ElementNode,
  destination: ElementNode,
  policy: PolicyOracle,
): CleaningResult {
  requireArgument(source, "source");
  requireArgument(destination, "destination");
  requireArgument(policy, "policy");

  const oracle = guardPolicy(policy);
  const ledger = new CleaningLedger();
  const root: DraftElement = {
    kind: "element",
    tagName: destination.tagName,
    namespace: destination.namespace,
    attributes: [...destination.attributes],
    children: [...destination.children],
  };

  const stack: Frame[] = [];
  pushChildren(stack, source, oracle.isSafeTag(source.tagName), root);
  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node, parentKept, cursor } = frame;
    switch (node.kind) {
      case "element":
        if (oracle.isSafeTag(node.tagName) && childNamespace(cursor, node) === node.namespace) {
          const copy = createSafeElement(node, oracle, ledger);
          cursor.children.push(copy);
          pushChildren(stack, node, true, copy);
        } else {
          ledger.removeNode(node);
          pushChildren(stack, node, false, cursor);
        }
        break;
      case "text":
        cursor.children.push(text(node.value));
        break;
      case "raw-data":
        if (parentKept) {
          cursor.children.push(rawData(node.value));
        } else {
          ledger.removeNode(node);
        }
        break;
      case "other":
        ledger.removeNode(node);
        break;
      default:
        assertNever(node);
    }
  }

  return ledger.finish(root);
}

/** Queue children so that popping yields them in document order */
function pushChildren(
  stack: Frame[],
  sourceParent: ElementNode,
  parentKept: boolean,
  cursor: DraftElement,
): void {
  for (let i = sourceParent.children.length - 1; i >= 0; i--) {
    const node = sourceParent.children[i];
    if (node !== undefined) stack.push({ node, parentKept, cursor });
  }
}

function createSafeElement(
  source: ElementNode,
  oracle: PolicyOracle,
  ledger: CleaningLedger,
): DraftElement {
  const attributes: Attribute[] = [];
  for (const attr of source.attributes) {
    if (oracle.isSafeAttribute(source.tagName, source, attr)) {
      attributes.push(attribute(attr.name, attr.value));
    } else {
      ledger.removeAttribute(attr);
    }
  }

  // Enforced attributes go on last. Names match case-insensitively: the first
  // match is replaced in place and any later ones are dropped.
  for (const enforced of oracle.enforcedAttributes(source.tagName)) {
    const name = enforced.name.toLowerCase();
    const index = attributes.findIndex((attr) => attr.name.toLowerCase() === name);
    const copy = attribute(enforced.name, enforced.value);
    if (index === -1) {
      attributes.push(copy);
      continue;
    }
    attributes[index] = copy;
    for (let i = attributes.length - 1; i > index; i--) {
      if (attributes[i]?.name.toLowerCase() === name) attributes.splice(i, 1);
    }
  }

  return {
    kind: "element",
    tagName: source.tagName,
    namespace: source.namespace,
    attributes,
    children: [],
  };
}

/** Wrap each oracle call so a throwing policy surfaces as SanitizePolicyFailedError */
function guardPolicy(policy: PolicyOracle): PolicyOracle {
  return {
    isSafeTag: (tagName) => invoke("isSafeTag", () => policy.isSafeTag(tagName)),
    isSafeAttribute: (tagName, element, attr) =>
      invoke("isSafeAttribute", () => policy.isSafeAttribute(tagName, element, attr)),
    enforcedAttributes: (tagName) =>
      invoke("enforcedAttributes", () => policy.enforcedAttributes(tagName)),
  };
}

function invoke<T>(method: keyof PolicyOracle, call: () => T): T {
  try {
    return call();
  } catch (error) {
    if (error instanceof SanitizePolicyFailedError) throw error;
    throw new SanitizePolicyFailedError(
      method,
      getErrorMessage(error),
      undefined,
      undefined,
      error instanceof Error ? error : undefined,
    );
  }
}

function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}
