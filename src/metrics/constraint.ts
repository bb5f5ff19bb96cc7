import type { GraphAdapter, TieEndpoints } from "../graph/adapter.js";
import { DEFAULT_TIE_MODE, type TieMode } from "../types.js";
import {
  buildInvestmentCache,
  computeInvestment,
  computeInvestmentSum,
  investmentSumFromCache,
} from "./investment.js";
import { tieReader } from "./ties.js";
import { validateMode, validateNode, validateNodes } from "./validation.js";

/**
 * Dyadic constraint `c_ij = (p_ij + Σ_q p_iq · p_qj)²`: how much `target`
 * constrains `source`, directly and through their shared alters. `0` when the
 * two nodes are not connected under `mode`.
 *
 * The tie can be given as two node ids or as any `{ from, to }` value (for
 * instance an entry of `NetworkModel#listEdges()`); both forms agree exactly.
 */
export function dyadicConstraint(graph: GraphAdapter, tie: TieEndpoints, mode?: TieMode): number;
export function dyadicConstraint(graph: GraphAdapter, source: number, target: number, mode?: TieMode): number;
export function dyadicConstraint(
  graph: GraphAdapter,
  sourceOrTie: number | TieEndpoints,
  targetOrMode?: number | TieMode,
  maybeMode?: TieMode,
): number {
  let source: number;
  let target: number;
  let mode: unknown;
  if (typeof sourceOrTie === "number") {
    source = sourceOrTie;
    target = typeof targetOrMode === "number" ? targetOrMode : Number.NaN;
    mode = maybeMode ?? DEFAULT_TIE_MODE;
  } else {
    source = sourceOrTie.from;
    target = sourceOrTie.to;
    mode = targetOrMode ?? DEFAULT_TIE_MODE;
  }

  validateNodes(graph, source, target);
  validateMode(mode);
  const read = tieReader(graph);
  const direct = computeInvestment(graph, read, source, target, mode);
  const indirect = computeInvestmentSum(graph, read, source, target, mode);
  return (direct + indirect) ** 2;
}

/**
 * Burt's network constraint `C_i = Σ_j c_ij` over the mode alters `j` of
 * `ego`. High values mean the ego's contacts are redundant (few structural
 * holes); an ego without alters scores `0`.
 *
 * The direct investments `p_ij` are computed once into a call-scoped cache and
 * reused for every indirect term, bringing a call down from O(d³) to O(d²)
 * investment evaluations. Summation order matches {@link dyadicConstraint}, so
 * `constraint(g, i)` equals the sum of the dyadic constraints bit for bit.
 */
export function constraint(graph: GraphAdapter, ego: number, mode: TieMode = DEFAULT_TIE_MODE): number {
  validateNode(graph, ego);
  validateMode(mode);

  const cache = buildInvestmentCache(graph, ego, mode);
  let total = 0;
  for (const [alter, direct] of cache) {
    total += (direct + investmentSumFromCache(cache, graph, ego, alter, mode)) ** 2;
  }
  return total;
}
