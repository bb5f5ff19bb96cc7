/**
 * Read-only view of a graph consumed by the metrics engine. The engine never
 * stores, mutates or traverses graphs beyond these adjacency queries, so any
 * graph library can be plugged in by implementing this interface.
 */

/** Direction filter applied when listing the neighbors of a node. */
export type NeighborDirection = "all" | "out" | "in";

export interface GraphAdapter {
  /** Whether edges carry a direction. Undirected adapters answer symmetrically. */
  readonly directed: boolean;
  /** Whether formulas should read edge weights instead of edge presence. */
  readonly weighted: boolean;

  /** Vertex identifiers (positive integers) in a stable order. */
  vertices(): readonly number[];

  hasVertex(node: number): boolean;

  /**
   * Neighbors of `node` filtered by `direction`, without duplicates and in a
   * stable order. `all` lists out-neighbors first, then in-neighbors not yet
   * seen. Self-loops are reported like any other tie.
   */
  neighbors(node: number, direction: NeighborDirection): readonly number[];

  hasEdge(from: number, to: number): boolean;

  /**
   * Raw stored weight of the edge `from → to`, `0` when the edge is absent.
   * Adapters do not police the value; the engine rejects non-finite and
   * negative weights when it reads them.
   */
  weight(from: number, to: number): number;
}

/** Any value exposing the endpoints of a tie, such as {@link NetworkEdge}. */
export interface TieEndpoints {
  readonly from: number;
  readonly to: number;
}
