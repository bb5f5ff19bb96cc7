import { NegativeWeightError, NonFiniteWeightError } from "../errors.js";
import type { GraphAdapter, NeighborDirection } from "../graph/adapter.js";
import type { TieMode } from "../types.js";

/** Strength of the single directed tie `from → to`; `0` when absent. */
export type TieReader = (from: number, to: number) => number;

/** Adjacency filter matching a {@link TieMode}. */
export function modeDirection(mode: TieMode): NeighborDirection {
  switch (mode) {
    case "both":
      return "all";
    case "out":
      return "out";
    case "in":
      return "in";
  }
}

/**
 * Alters of `ego` under `mode`: the mode-filtered neighbors with the ego
 * itself removed so self-loops never reach the formulas.
 */
export function egoAlters(graph: GraphAdapter, ego: number, mode: TieMode): number[] {
  return graph.neighbors(ego, modeDirection(mode)).filter((alter) => alter !== ego);
}

/**
 * Reads the stored weight of `from → to`, refusing non-finite and negative
 * values. Absent edges weigh `0` and are never looked up.
 */
export function readTieWeight(graph: GraphAdapter, from: number, to: number): number {
  if (!graph.hasEdge(from, to)) {
    return 0;
  }
  const weight = graph.weight(from, to);
  if (!Number.isFinite(weight)) {
    throw new NonFiniteWeightError(from, to, weight);
  }
  if (weight < 0) {
    throw new NegativeWeightError(from, to, weight);
  }
  return weight;
}

/**
 * Picks the per-edge strength once per computation: checked weights on
 * weighted graphs, edge presence (0/1) otherwise.
 */
export function tieReader(graph: GraphAdapter): TieReader {
  if (graph.weighted) {
    return (from, to) => readTieWeight(graph, from, to);
  }
  return (from, to) => (graph.hasEdge(from, to) ? 1 : 0);
}

/**
 * Mode-combined strength of the tie between `ego` and `alter`. `both` adds the
 * two directions and counts a missing direction as zero.
 */
export function tieStrength(read: TieReader, ego: number, alter: number, mode: TieMode): number {
  switch (mode) {
    case "both":
      return read(ego, alter) + read(alter, ego);
    case "out":
      return read(ego, alter);
    case "in":
      return read(alter, ego);
  }
}
