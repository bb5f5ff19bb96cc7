import { performance } from "node:perf_hooks";

import { classifyBrokerage, type BrokerageProfile } from "../brokerage/classify.js";
import type { GroupAssignment } from "../brokerage/groups.js";
import { createLogger, loadMetricsConfig } from "../config/metrics.js";
import { NetworkMetricError } from "../errors.js";
import type { GraphAdapter } from "../graph/adapter.js";
import type { StructuredLogger } from "../logger.js";
import { constraint } from "../metrics/constraint.js";
import { egoAlters } from "../metrics/ties.js";
import { validateMode } from "../metrics/validation.js";
import type { TieMode } from "../types.js";

export interface NodeStructuralSummary {
  readonly node: number;
  /** Size of the node's ego network under the report mode, self excluded. */
  readonly alters: number;
  readonly constraint: number;
  readonly brokerage?: BrokerageProfile;
}

export interface NetworkReport {
  readonly mode: TieMode;
  readonly directed: boolean;
  readonly weighted: boolean;
  /** One summary per vertex, in `graph.vertices()` order. */
  readonly nodes: NodeStructuralSummary[];
}

export interface AnalyzeNetworkOptions<G> {
  /** Defaults to the configured default mode. */
  readonly mode?: TieMode;
  /** When present, every summary carries the node's brokerage profile. */
  readonly groups?: GroupAssignment<G>;
  readonly logger?: StructuredLogger;
}

/**
 * Computes the constraint of every vertex (and, given group labels, its
 * brokerage profile). Failures are logged, then rethrown untouched.
 */
export function analyzeNetwork<G>(graph: GraphAdapter, options: AnalyzeNetworkOptions<G> = {}): NetworkReport {
  const config = loadMetricsConfig();
  const logger = options.logger ?? createLogger(config);
  const mode = options.mode ?? config.defaultMode;
  const vertices = graph.vertices();
  const startedAt = performance.now();

  logger.debug("network_analysis_started", {
    mode,
    vertices: vertices.length,
    directed: graph.directed,
    weighted: graph.weighted,
    brokerage: options.groups !== undefined,
  });

  try {
    validateMode(mode);
    const brokerage = options.groups !== undefined ? classifyBrokerage(graph, options.groups) : null;
    const nodes = vertices.map((node): NodeStructuralSummary => {
      const profile = brokerage?.profiles.get(node);
      return {
        node,
        alters: egoAlters(graph, node, mode).length,
        constraint: constraint(graph, node, mode),
        ...(profile ? { brokerage: profile } : {}),
      };
    });

    logger.info("network_analysis_completed", {
      mode,
      vertices: nodes.length,
      duration_ms: Math.round(performance.now() - startedAt),
    });
    return { mode, directed: graph.directed, weighted: graph.weighted, nodes };
  } catch (error) {
    logger.error("network_analysis_failed", {
      mode,
      name: error instanceof Error ? error.name : "unknown",
      code: error instanceof NetworkMetricError ? error.code : null,
      message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
