import type { Attribute, ElementNode, MarkupNode } from "@sieve/markup";
import type { CleaningResult } from "./types.js";

/**
 * Accumulates what one traversal discards. Owned by exactly one traversal;
 * `finish()` freezes the output tree and hands out a frozen CleaningResult.
 */
export class CleaningLedger {
  private readonly removedNodes: MarkupNode[] = [];
  private readonly removedAttributes: Attribute[] = [];

  removeNode(node: MarkupNode): void {
    this.removedNodes.push(node);
  }

  removeAttribute(attr: Attribute): void {
    this.removedAttributes.push(attr);
  }

  get removedCount(): number {
    return this.removedNodes.length + this.removedAttributes.length;
  }

  finish(root: ElementNode): CleaningResult {
    const removedCount = this.removedCount;
    const result: CleaningResult = {
      root: freezeTree(root),
      removedNodes: Object.freeze([...this.removedNodes]),
      removedAttributes: Object.freeze([...this.removedAttributes]),
      removedCount,
      safe: removedCount === 0,
    };
    return Object.freeze(result);
  }
}

function freezeTree(root: ElementNode): ElementNode {
  const pending: ElementNode[] = [root];
  for (let el = pending.pop(); el !== undefined; el = pending.pop()) {
    // Factory-built elements arrive frozen along with their subtrees
    if (Object.isFrozen(el)) continue;
    Object.freeze(el.attributes);
    Object.freeze(el.children);
    Object.freeze(el);
    for (const child of el.children) {
      if (child.kind === "element") pending.push(child);
    }
  }
  return root;
}
