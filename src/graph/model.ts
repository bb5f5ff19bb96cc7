import { InvalidNodeError, NonFiniteWeightError } from "../errors.js";
import type { GraphAdapter, NeighborDirection } from "./adapter.js";

export interface NetworkEdge {
  readonly from: number;
  readonly to: number;
  readonly weight: number;
}

/** Edge as supplied to the constructor. Unweighted networks ignore `weight`. */
export interface NetworkEdgeInput {
  readonly from: number;
  readonly to: number;
  readonly weight?: number;
}

export interface NetworkModelInit {
  readonly name?: string;
  readonly directed: boolean;
  readonly weighted: boolean;
  readonly nodes: Iterable<number>;
  readonly edges: Iterable<NetworkEdgeInput>;
}

/**
 * In-memory {@link GraphAdapter}. Adjacency is indexed in both directions so
 * every query the engine issues is a map lookup. Undirected networks share a
 * single index, which makes `hasEdge` and `weight` symmetric by construction.
 * Declaring the same edge twice keeps the last weight. Weights must be finite;
 * negative ones are stored and refused by the formulas that read them.
 */
export class NetworkModel implements GraphAdapter {
  readonly name: string;
  readonly directed: boolean;
  readonly weighted: boolean;
  private readonly nodeIds: number[];
  private readonly outgoing: Map<number, Map<number, number>>;
  private readonly incoming: Map<number, Map<number, number>>;
  private readonly edgeIndex: Map<string, NetworkEdge>;

  constructor(init: NetworkModelInit) {
    this.name = init.name ?? "network";
    this.directed = init.directed;
    this.weighted = init.weighted;
    this.outgoing = new Map();
    this.incoming = this.directed ? new Map() : this.outgoing;
    this.edgeIndex = new Map();

    for (const node of init.nodes) {
      if (!Number.isInteger(node) || node <= 0) {
        throw new InvalidNodeError(node, "not_positive_integer");
      }
      if (!this.outgoing.has(node)) {
        this.outgoing.set(node, new Map());
        if (this.directed) {
          this.incoming.set(node, new Map());
        }
      }
    }
    this.nodeIds = Array.from(this.outgoing.keys());

    for (const edge of init.edges) {
      this.addEdge(edge);
    }
  }

  get vertexCount(): number {
    return this.nodeIds.length;
  }

  vertices(): readonly number[] {
    return this.nodeIds;
  }

  hasVertex(node: number): boolean {
    return this.outgoing.has(node);
  }

  neighbors(node: number, direction: NeighborDirection): readonly number[] {
    const outs = this.outgoing.get(node);
    if (!outs) {
      return [];
    }
    if (!this.directed || direction === "out") {
      return Array.from(outs.keys());
    }
    const ins = this.incoming.get(node) ?? new Map<number, number>();
    if (direction === "in") {
      return Array.from(ins.keys());
    }
    const union = new Set(outs.keys());
    for (const source of ins.keys()) {
      union.add(source);
    }
    return Array.from(union);
  }

  hasEdge(from: number, to: number): boolean {
    return this.outgoing.get(from)?.has(to) ?? false;
  }

  weight(from: number, to: number): number {
    return this.outgoing.get(from)?.get(to) ?? 0;
  }

  /** Declared edges, once each, in declaration order. */
  listEdges(): NetworkEdge[] {
    return Array.from(this.edgeIndex.values());
  }

  private addEdge(edge: NetworkEdgeInput): void {
    const { from, to } = edge;
    for (const endpoint of [from, to]) {
      if (!Number.isInteger(endpoint) || endpoint <= 0) {
        throw new InvalidNodeError(endpoint, "not_positive_integer");
      }
      if (!this.outgoing.has(endpoint)) {
        throw new InvalidNodeError(endpoint, "not_in_graph");
      }
    }

    const weight = this.weighted ? edge.weight ?? 1 : 1;
    if (!Number.isFinite(weight)) {
      throw new NonFiniteWeightError(from, to, weight);
    }
    this.outgoing.get(from)?.set(to, weight);
    this.incoming.get(to)?.set(from, weight);
    const key = this.directed || from <= to ? `${from}->${to}` : `${to}->${from}`;
    this.edgeIndex.set(key, { from, to, weight });
  }
}
