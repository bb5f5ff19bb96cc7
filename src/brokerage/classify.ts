import type { GraphAdapter } from "../graph/adapter.js";
import { validateNode } from "../metrics/validation.js";
import { GroupIndex, type GroupAssignment } from "./groups.js";
import { classifyRole, type BrokerageRole } from "./roles.js";

/** Number of open triads an ego brokers, per role, plus their total. */
export type BrokerageProfile = Record<BrokerageRole, number> & { total: number };

export interface BrokerageResult {
  /** Vertices in `graph.vertices()` order. */
  readonly nodes: readonly number[];
  readonly profiles: ReadonlyMap<number, BrokerageProfile>;
}

/**
 * Counts the brokerage roles of `ego`. Every pair made of an in-neighbor `a`
 * and an out-neighbor `b` of the ego is a candidate triad `a → ego → b`; it is
 * brokered when `a` and `b` are distinct, both differ from the ego and `a` has
 * no direct tie to `b`. On undirected graphs each open pair is therefore seen
 * once per orientation.
 */
export function brokerageProfile<G>(graph: GraphAdapter, groups: GroupAssignment<G>, ego: number): BrokerageProfile {
  validateNode(graph, ego);
  return profileOf(graph, new GroupIndex(graph, groups), ego);
}

/** Brokerage profile of every vertex; the group assignment is validated once. */
export function classifyBrokerage<G>(graph: GraphAdapter, groups: GroupAssignment<G>): BrokerageResult {
  const index = new GroupIndex(graph, groups);
  const nodes = [...graph.vertices()];
  const profiles = new Map<number, BrokerageProfile>();
  for (const ego of nodes) {
    profiles.set(ego, profileOf(graph, index, ego));
  }
  return { nodes, profiles };
}

/** Per-vertex count of a single role. */
export function roleCounts(result: BrokerageResult, role: BrokerageRole): Map<number, number> {
  return new Map(result.nodes.map((node): [number, number] => [node, result.profiles.get(node)?.[role] ?? 0]));
}

/** Per-vertex number of brokered triads, all roles together. */
export function totalBrokerage(result: BrokerageResult): Map<number, number> {
  return new Map(result.nodes.map((node): [number, number] => [node, result.profiles.get(node)?.total ?? 0]));
}

export function emptyBrokerageProfile(): BrokerageProfile {
  return { coordinator: 0, gatekeeper: 0, representative: 0, liaison: 0, cosmopolitan: 0, total: 0 };
}

function profileOf<G>(graph: GraphAdapter, index: GroupIndex<G>, ego: number): BrokerageProfile {
  const profile = emptyBrokerageProfile();
  const senders = graph.neighbors(ego, "in").filter((node) => node !== ego);
  const receivers = graph.neighbors(ego, "out").filter((node) => node !== ego);
  const egoGroup = index.groupOf(ego);

  for (const sender of senders) {
    const senderGroup = index.groupOf(sender);
    for (const receiver of receivers) {
      if (receiver === sender || graph.hasEdge(sender, receiver)) {
        continue;
      }
      profile[classifyRole(egoGroup, senderGroup, index.groupOf(receiver))] += 1;
      profile.total += 1;
    }
  }
  return profile;
}
