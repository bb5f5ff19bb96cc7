/**
 * Shared types used across the metrics engine. Grouping these definitions keeps
 * the string unions and error codes consistent between modules.
 */

/**
 * Selects which ties of a directed graph feed the formulas. `both` symmetrises
 * the graph, `out` keeps the ego's outgoing ties and `in` its incoming ties.
 */
export type TieMode = "both" | "out" | "in";

/** Every accepted {@link TieMode}, in canonical order. */
export const TIE_MODES: readonly TieMode[] = ["both", "out", "in"];

/** Mode applied when callers do not pick one. */
export const DEFAULT_TIE_MODE: TieMode = "both";

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth lets callers branch on codes rather than
 * on message text.
 */
export const ERROR_CATALOG = {
  NODE: {
    INVALID: "E-NODE-INVALID",
  },
  MODE: {
    INVALID: "E-MODE-INVALID",
  },
  WEIGHT: {
    NEGATIVE: "E-WEIGHT-NEGATIVE",
    NON_FINITE: "E-WEIGHT-NON-FINITE",
  },
  GROUPS: {
    INVALID: "E-GROUPS-INVALID",
  },
  GRAPH: {
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `WEIGHT_NEGATIVE`). The helper keeps runtime data immutable while
 * preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family: T[keyof T & string] = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      const code: T[keyof T & string][keyof T[keyof T & string] & string] = family[codeKey];
      flat[`${familyKey}_${codeKey}`] = code;
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.NODE_INVALID`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the library. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];
