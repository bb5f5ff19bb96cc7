import { GroupAssignmentError } from "../errors.js";
import type { GraphAdapter } from "../graph/adapter.js";

/**
 * Group label of every vertex. Arrays are aligned with `graph.vertices()`
 * (entry `k` labels the `k`-th vertex); maps are keyed by vertex id.
 */
export type GroupAssignment<G> = readonly G[] | ReadonlyMap<number, G>;

/**
 * Checks that `groups` labels every vertex of `graph`.
 *
 * @throws GroupAssignmentError when an array's length differs from the vertex
 * count, when a map misses a vertex, or when `groups` is neither.
 */
export function validateGroups(graph: GraphAdapter, groups: unknown): asserts groups is GroupAssignment<unknown> {
  const vertices = graph.vertices();
  if (Array.isArray(groups)) {
    if (groups.length !== vertices.length) {
      throw new GroupAssignmentError(
        `group list length (${groups.length}) does not match number of vertices (${vertices.length})`,
        { expected: vertices.length, received: groups.length },
      );
    }
    return;
  }
  if (groups instanceof Map) {
    for (const vertex of vertices) {
      if (!groups.has(vertex)) {
        throw new GroupAssignmentError(`vertex ${vertex} is missing from the group map`, { vertex });
      }
    }
    return;
  }
  const shape = describeShape(groups);
  throw new GroupAssignmentError(`groups must be an array or a Map, got ${shape}`, { received: shape });
}

function describeShape(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    const ctor: unknown = Reflect.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}

/**
 * Validated vertex → label lookup. Labels are boxed so `undefined` or `null`
 * remain usable group labels.
 */
export class GroupIndex<G> {
  private readonly labels = new Map<number, { readonly label: G }>();

  constructor(graph: GraphAdapter, groups: GroupAssignment<G>) {
    validateGroups(graph, groups);
    if (isGroupList(groups)) {
      const vertices = graph.vertices();
      groups.forEach((label, position) => {
        const vertex = vertices[position];
        if (vertex !== undefined) {
          this.labels.set(vertex, { label });
        }
      });
    } else {
      for (const [vertex, label] of groups) {
        this.labels.set(vertex, { label });
      }
    }
  }

  groupOf(vertex: number): G {
    const entry = this.labels.get(vertex);
    if (!entry) {
      throw new GroupAssignmentError(`vertex ${vertex} has no group`, { vertex });
    }
    return entry.label;
  }
}

/** Label of a single vertex. */
export function groupOf<G>(graph: GraphAdapter, groups: GroupAssignment<G>, vertex: number): G {
  return new GroupIndex(graph, groups).groupOf(vertex);
}

/** Labels listed in `graph.vertices()` order, whatever the assignment's shape. */
export function groupsInVertexOrder<G>(graph: GraphAdapter, groups: GroupAssignment<G>): G[] {
  const index = new GroupIndex(graph, groups);
  return graph.vertices().map((vertex) => index.groupOf(vertex));
}

/**
 * Replaces arbitrary labels by integers `0, 1, …` in order of first
 * occurrence. Equality is SameValueZero, as in {@link classifyRole}.
 *
 * ```ts
 * groupsToIntegerLabels(["Sales", "Sales", "Eng", "HR", "Eng"]); // [0, 0, 1, 2, 1]
 * ```
 */
export function groupsToIntegerLabels<G>(labels: readonly G[]): number[] {
  const ids = new Map<G, number>();
  return labels.map((label) => {
    let id = ids.get(label);
    if (id === undefined) {
      id = ids.size;
      ids.set(label, id);
    }
    return id;
  });
}

function isGroupList<G>(groups: GroupAssignment<G>): groups is readonly G[] {
  return Array.isArray(groups);
}
