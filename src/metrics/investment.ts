import type { GraphAdapter } from "../graph/adapter.js";
import { DEFAULT_TIE_MODE, type TieMode } from "../types.js";
import { egoAlters, tieReader, tieStrength, type TieReader } from "./ties.js";
import { validateMode, validateNodes } from "./validation.js";

/**
 * Direct investments of an ego keyed by alter, in alter order. Built by
 * {@link buildInvestmentCache} for a single computation and passed down by
 * parameter; never shared between calls.
 */
export type InvestmentCache = ReadonlyMap<number, number>;

/**
 * Proportional investment `p_ij`: the share of `source`'s total tie strength
 * (under `mode`) that goes to `target`.
 *
 * ```
 * both: (s_ij + s_ji) / Σ_k (s_ik + s_ki)
 * out:   s_ij         / Σ_k  s_ik
 * in:    s_ji         / Σ_k  s_ki
 * ```
 *
 * `k` ranges over the mode alters of `source` and `s` is the edge weight on
 * weighted graphs, edge presence otherwise. Self-investment and investment of
 * an ego without ties are `0`.
 *
 * @throws InvalidNodeError when either node is not in the graph.
 * @throws InvalidModeError when `mode` is not a {@link TieMode}.
 * @throws NegativeWeightError when a weight read by the formula is negative.
 */
export function investment(
  graph: GraphAdapter,
  source: number,
  target: number,
  mode: TieMode = DEFAULT_TIE_MODE,
): number {
  validateNodes(graph, source, target);
  validateMode(mode);
  return computeInvestment(graph, tieReader(graph), source, target, mode);
}

/**
 * Indirect investment of `source` in `target` through every shared alter:
 * `Σ_q p_iq · p_qj` for `q` in the mode alters of `source`, `q ≠ target`.
 */
export function investmentSum(
  graph: GraphAdapter,
  source: number,
  target: number,
  mode: TieMode = DEFAULT_TIE_MODE,
): number {
  validateNodes(graph, source, target);
  validateMode(mode);
  return computeInvestmentSum(graph, tieReader(graph), source, target, mode);
}

/**
 * Same sum as {@link investmentSum} with the direct investments `p_iq` taken
 * from `cache`. Arguments are trusted: callers validate once up front.
 */
export function investmentSumFromCache(
  cache: InvestmentCache,
  graph: GraphAdapter,
  source: number,
  target: number,
  mode: TieMode,
): number {
  const read = tieReader(graph);
  let total = 0;
  for (const [intermediary, direct] of cache) {
    if (intermediary === target) {
      continue;
    }
    total += direct * computeInvestment(graph, read, intermediary, target, mode);
  }
  return total;
}

/** Investments of `ego` in each of its mode alters. */
export function buildInvestmentCache(graph: GraphAdapter, ego: number, mode: TieMode): Map<number, number> {
  const read = tieReader(graph);
  const cache = new Map<number, number>();
  for (const alter of egoAlters(graph, ego, mode)) {
    cache.set(alter, computeInvestment(graph, read, ego, alter, mode));
  }
  return cache;
}

/** Unchecked {@link investment}; shared by the public entry points. */
export function computeInvestment(
  graph: GraphAdapter,
  read: TieReader,
  source: number,
  target: number,
  mode: TieMode,
): number {
  if (source === target) {
    return 0;
  }

  let denominator = 0;
  for (const alter of egoAlters(graph, source, mode)) {
    denominator += tieStrength(read, source, alter, mode);
  }
  if (denominator === 0) {
    return 0;
  }
  return tieStrength(read, source, target, mode) / denominator;
}

/** Unchecked {@link investmentSum}. */
export function computeInvestmentSum(
  graph: GraphAdapter,
  read: TieReader,
  source: number,
  target: number,
  mode: TieMode,
): number {
  let total = 0;
  for (const intermediary of egoAlters(graph, source, mode)) {
    if (intermediary === target) {
      continue;
    }
    total +=
      computeInvestment(graph, read, source, intermediary, mode) *
      computeInvestment(graph, read, intermediary, target, mode);
  }
  return total;
}
