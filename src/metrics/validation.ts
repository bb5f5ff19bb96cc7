import { InvalidModeError, InvalidNodeError } from "../errors.js";
import type { GraphAdapter } from "../graph/adapter.js";
import { TIE_MODES, type TieMode } from "../types.js";

/**
 * Ensures `node` is a positive integer belonging to `graph`. Runs before any
 * arithmetic so the formulas only ever see resolvable vertices.
 */
export function validateNode(graph: GraphAdapter, node: number): void {
  if (!Number.isInteger(node) || node <= 0) {
    throw new InvalidNodeError(node, "not_positive_integer");
  }
  if (graph.vertices().length === 0) {
    throw new InvalidNodeError(node, "empty_graph");
  }
  if (!graph.hasVertex(node)) {
    throw new InvalidNodeError(node, "not_in_graph");
  }
}

export function validateNodes(graph: GraphAdapter, source: number, target: number): void {
  validateNode(graph, source);
  validateNode(graph, target);
}

/**
 * Narrows an arbitrary value to {@link TieMode}. The type system already closes
 * the union for typed callers; the runtime check guards the public boundary.
 */
export function validateMode(mode: unknown): asserts mode is TieMode {
  if (!isTieMode(mode)) {
    throw new InvalidModeError(mode);
  }
}

export function isTieMode(value: unknown): value is TieMode {
  return TIE_MODES.some((mode) => mode === value);
}
