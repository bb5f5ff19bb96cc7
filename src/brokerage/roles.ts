/**
 * Gould–Fernandez brokerage roles of an ego sitting on the path
 * `in-neighbor → ego → out-neighbor`.
 */
export type BrokerageRole = "coordinator" | "gatekeeper" | "representative" | "liaison" | "cosmopolitan";

/** Roles in the order {@link classifyRole} tests them. */
export const BROKERAGE_ROLES: readonly BrokerageRole[] = [
  "coordinator",
  "gatekeeper",
  "representative",
  "liaison",
  "cosmopolitan",
];

/**
 * Classifies one triad from the group labels of the ego, of the node sending
 * to the ego and of the node the ego sends to. Labels are compared with
 * SameValueZero, the equality `Map` keys use (so `NaN` matches itself); the
 * checks run in the order of {@link BROKERAGE_ROLES}.
 *
 * - coordinator: all three share a group
 * - gatekeeper: ego and out-neighbor share a group the in-neighbor is outside of
 * - representative: ego and in-neighbor share a group the out-neighbor is outside of
 * - liaison: in- and out-neighbor share a group the ego is outside of
 * - cosmopolitan: three distinct groups
 */
export function classifyRole<G>(groupEgo: G, groupIn: G, groupOut: G): BrokerageRole {
  const egoIn = sameGroup(groupEgo, groupIn);
  const egoOut = sameGroup(groupEgo, groupOut);
  const inOut = sameGroup(groupIn, groupOut);
  if (egoIn && inOut) {
    return "coordinator";
  }
  if (egoOut && !egoIn) {
    return "gatekeeper";
  }
  if (egoIn && !egoOut) {
    return "representative";
  }
  if (inOut && !egoIn) {
    return "liaison";
  }
  return "cosmopolitan";
}

/** SameValueZero. */
function sameGroup<G>(left: G, right: G): boolean {
  return left === right || (Number.isNaN(left) && Number.isNaN(right));
}
