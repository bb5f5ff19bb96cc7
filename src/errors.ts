import { ERROR_CODES, type ErrorCode } from "./types.js";

/**
 * Base class for every failure raised by the metrics engine. Subclasses fix the
 * stable {@link ErrorCode} and attach the structured details callers need to
 * report the offending node, mode or edge.
 */
export class NetworkMetricError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "NetworkMetricError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Why a node index was refused. */
export type InvalidNodeReason = "not_positive_integer" | "empty_graph" | "not_in_graph";

/** Raised when a node index is not a positive integer of the graph's vertex set. */
export class InvalidNodeError extends NetworkMetricError {
  readonly node: unknown;
  readonly reason: InvalidNodeReason;

  constructor(node: unknown, reason: InvalidNodeReason) {
    super(ERROR_CODES.NODE_INVALID, describeInvalidNode(node, reason), { node, reason });
    this.name = "InvalidNodeError";
    this.node = node;
    this.reason = reason;
  }
}

function describeInvalidNode(node: unknown, reason: InvalidNodeReason): string {
  switch (reason) {
    case "not_positive_integer":
      return `node index must be a positive integer, got ${String(node)}`;
    case "empty_graph":
      return `node ${String(node)} cannot be resolved: the graph has no vertices`;
    case "not_in_graph":
      return `node ${String(node)} is not in the graph`;
  }
}

/** Raised when a tie mode is not one of `both`, `out` or `in`. */
export class InvalidModeError extends NetworkMetricError {
  readonly mode: unknown;

  constructor(mode: unknown) {
    super(ERROR_CODES.MODE_INVALID, `mode must be "both", "out" or "in", got ${printMode(mode)}`, { mode });
    this.name = "InvalidModeError";
    this.mode = mode;
  }
}

function printMode(mode: unknown): string {
  return typeof mode === "string" ? `"${mode}"` : String(mode);
}

/**
 * Raised when a formula reads a negative edge weight. Negative investments have
 * no meaning so the engine refuses to produce a number instead of clamping.
 */
export class NegativeWeightError extends NetworkMetricError {
  readonly from: number;
  readonly to: number;
  readonly weight: number;

  constructor(from: number, to: number, weight: number) {
    super(
      ERROR_CODES.WEIGHT_NEGATIVE,
      `edge weight must be non-negative, got weight=${weight} for edge (${from}, ${to})`,
      { from, to, weight },
    );
    this.name = "NegativeWeightError";
    this.from = from;
    this.to = to;
    this.weight = weight;
  }
}

/** Raised when an edge weight is `NaN` or infinite. */
export class NonFiniteWeightError extends NetworkMetricError {
  readonly from: number;
  readonly to: number;
  readonly weight: number;

  constructor(from: number, to: number, weight: number) {
    super(
      ERROR_CODES.WEIGHT_NON_FINITE,
      `edge weight must be finite, got weight=${weight} for edge (${from}, ${to})`,
      { from, to, weight },
    );
    this.name = "NonFiniteWeightError";
    this.from = from;
    this.to = to;
    this.weight = weight;
  }
}

/** Raised when a group assignment does not line up with the graph's vertices. */
export class GroupAssignmentError extends NetworkMetricError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ERROR_CODES.GROUPS_INVALID, message, details);
    this.name = "GroupAssignmentError";
  }
}

/** Single issue reported while parsing a network descriptor. */
export interface NetworkDescriptorIssue {
  /** JSON pointer to the offending location inside the payload. */
  path: string;
  message: string;
}

/** Raised when a network descriptor payload fails schema validation. */
export class NetworkDescriptorError extends NetworkMetricError {
  readonly issues: NetworkDescriptorIssue[];

  constructor(issues: NetworkDescriptorIssue[]) {
    super(
      ERROR_CODES.GRAPH_INVALID_INPUT,
      issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ") || "invalid network descriptor",
      { issues },
    );
    this.name = "NetworkDescriptorError";
    this.issues = issues;
  }
}
