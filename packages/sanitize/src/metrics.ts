/**
 * OTel metrics for cleaning operations.
 *
 * Counts what each facade operation removes and how long it takes.
 * Instruments are created on first access; without a registered meter
 * provider they are no-ops.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";
import type { CleaningResult } from "./types.js";

export const METER_NAME = "sieve.sanitize";

/**
 * Facade operation a measurement belongs to.
 */
export type CleanerOperation =
  | "clean"
  | "is_valid"
  | "is_valid_body_html"
  | "clean_body_html"
  | "clean_html";

let _removedNodes: Counter | undefined;
let _removedAttributes: Counter | undefined;
let _cleanDuration: Histogram | undefined;

/**
 * Get the counter for nodes discarded by cleaning.
 */
export function getRemovedNodesCounter(): Counter {
  if (_removedNodes === undefined) {
    _removedNodes = metrics.getMeter(METER_NAME).createCounter("sieve.clean.removed_nodes", {
      description: "Nodes discarded while cleaning untrusted markup",
    });
  }
  return _removedNodes;
}

/**
 * Get the counter for attributes discarded from kept elements.
 */
export function getRemovedAttributesCounter(): Counter {
  if (_removedAttributes === undefined) {
    _removedAttributes = metrics
      .getMeter(METER_NAME)
      .createCounter("sieve.clean.removed_attributes", {
        description: "Attributes discarded from elements that survived cleaning",
      });
  }
  return _removedAttributes;
}

/**
 * Get the histogram for cleaning duration in milliseconds.
 * Covers parsing as well for the string-taking operations.
 */
export function getCleanDuration(): Histogram {
  if (_cleanDuration === undefined) {
    _cleanDuration = metrics.getMeter(METER_NAME).createHistogram("sieve.clean.duration_ms", {
      description: "Cleaning duration in milliseconds per operation",
      unit: "ms",
    });
  }
  return _cleanDuration;
}

/**
 * Record the outcome of one facade operation.
 */
export function recordCleaning(
  operation: CleanerOperation,
  result: CleaningResult,
  durationMs: number,
): void {
  const attributes = { operation };
  getRemovedNodesCounter().add(result.removedNodes.length, attributes);
  getRemovedAttributesCounter().add(result.removedAttributes.length, attributes);
  getCleanDuration().record(durationMs, attributes);
}
