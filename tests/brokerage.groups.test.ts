import { describe, it } from "mocha";
import { expect } from "chai";

import {
  GroupIndex,
  groupOf,
  groupsInVertexOrder,
  groupsToIntegerLabels,
  validateGroups,
} from "../src/brokerage/groups.js";
import { GroupAssignmentError } from "../src/errors.js";
import { ERROR_CODES } from "../src/types.js";
import { buildNetwork } from "./helpers/networks.js";

describe("brokerage/groups", () => {
  const graph = buildNetwork(3, [[5, 9]], { nodes: [9, 5, 2] });

  it("aligns arrays with the vertex order", () => {
    expect(groupOf(graph, ["north", "south", "east"], 5)).to.equal("south");
    expect(groupsInVertexOrder(graph, ["north", "south", "east"])).to.deep.equal(["north", "south", "east"]);
  });

  it("reads maps by vertex id", () => {
    const groups = new Map([
      [2, "east"],
      [9, "north"],
      [5, "south"],
    ]);

    expect(groupOf(graph, groups, 9)).to.equal("north");
    expect(groupsInVertexOrder(graph, groups)).to.deep.equal(["north", "south", "east"]);
  });

  it("accepts undefined as a label", () => {
    const index = new GroupIndex<string | undefined>(graph, [undefined, "a", undefined]);

    expect(index.groupOf(9)).to.equal(undefined);
    expect(index.groupOf(5)).to.equal("a");
    expect(() => index.groupOf(4)).to.throw(GroupAssignmentError, "vertex 4 has no group");
  });

  it("rejects arrays of the wrong length", () => {
    expect(() => validateGroups(graph, ["a", "b"]))
      .to.throw(GroupAssignmentError, "group list length (2) does not match number of vertices (3)")
      .with.property("code", ERROR_CODES.GROUPS_INVALID);
  });

  it("rejects maps missing a vertex", () => {
    const groups = new Map([
      [9, "a"],
      [5, "b"],
    ]);

    expect(() => validateGroups(graph, groups)).to.throw(GroupAssignmentError, "vertex 2 is missing from the group map");
  });

  it("rejects other shapes", () => {
    expect(() => validateGroups(graph, { 9: "a" })).to.throw(
      GroupAssignmentError,
      "groups must be an array or a Map, got Object",
    );
    expect(() => validateGroups(graph, null)).to.throw(GroupAssignmentError, "got null");
    expect(() => validateGroups(graph, "abc")).to.throw(GroupAssignmentError, "got string");
  });

  it("numbers labels by first occurrence", () => {
    expect(groupsToIntegerLabels(["Sales", "Sales", "Eng", "HR", "Eng"])).to.deep.equal([0, 0, 1, 2, 1]);
    expect(groupsToIntegerLabels([7, 3, 7])).to.deep.equal([0, 1, 0]);
    expect(groupsToIntegerLabels([])).to.deep.equal([]);
  });
});
