import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidModeError, InvalidNodeError } from "../src/errors.js";
import { constraint, dyadicConstraint } from "../src/metrics/constraint.js";
import { egoAlters } from "../src/metrics/ties.js";
import { buildNetwork, completeGraph, cycleGraph, pathGraph, starGraph } from "./helpers/networks.js";

describe("metrics/constraint", () => {
  it("constrains star leaves more than the centre", () => {
    const graph = starGraph(5);

    expect(constraint(graph, 1)).to.be.closeTo(0.25, 1e-12);
    expect(constraint(graph, 2)).to.equal(1);
    expect(constraint(graph, 1)).to.be.lessThan(constraint(graph, 2));
  });

  it("scores 1.125 on every node of a unit-weight triangle", () => {
    const graph = buildNetwork(
      3,
      [
        [1, 2, 1],
        [2, 3, 1],
        [1, 3, 1],
      ],
      { weighted: true },
    );

    for (const node of [1, 2, 3]) {
      expect(constraint(graph, node)).to.be.closeTo(1.125, 1e-10);
    }
  });

  it("gives every node of a cycle the same constraint", () => {
    const graph = cycleGraph(5);

    for (const node of [1, 2, 3, 4, 5]) {
      expect(constraint(graph, node)).to.be.closeTo(0.5, 1e-12);
    }
  });

  it("adds indirect investment on complete graphs", () => {
    const graph = completeGraph(4);

    expect(constraint(graph, 1)).to.be.closeTo(75 / 81, 1e-12);
    expect(constraint(graph, 2)).to.be.closeTo(constraint(graph, 1), 1e-12);
  });

  it("constrains path ends more than the middle", () => {
    const graph = pathGraph(5);

    expect(constraint(graph, 1)).to.equal(1);
    expect(constraint(graph, 3)).to.be.closeTo(0.5, 1e-12);
  });

  it("returns zero for isolated nodes and nodes with only a self-loop", () => {
    const graph = buildNetwork(5, [
      [1, 2],
      [1, 3],
      [4, 4],
    ]);

    expect(constraint(graph, 5)).to.equal(0);
    expect(constraint(graph, 4)).to.equal(0);
  });

  it("treats the directed four-cycle symmetrically", () => {
    const graph = cycleGraph(4, { directed: true });

    for (const node of [1, 2, 3, 4]) {
      expect(constraint(graph, node, "out")).to.equal(1);
      expect(constraint(graph, node, "in")).to.equal(1);
      expect(constraint(graph, node, "both")).to.equal(0.5);
    }
  });

  it("equals the sum of its dyadic constraints", () => {
    const graph = buildNetwork(
      5,
      [
        [1, 2, 2],
        [1, 3, 1],
        [2, 3, 4],
        [3, 4, 1],
        [4, 1, 3],
        [5, 1, 0.5],
      ],
      { directed: true, weighted: true },
    );

    for (const mode of ["both", "out", "in"] as const) {
      for (const ego of graph.vertices()) {
        const decomposed = egoAlters(graph, ego, mode).reduce(
          (sum, alter) => sum + dyadicConstraint(graph, ego, alter, mode),
          0,
        );
        expect(constraint(graph, ego, mode)).to.equal(decomposed);
      }
    }
  });

  it("returns identical results on repeated calls", () => {
    const graph = completeGraph(5);

    expect(constraint(graph, 3)).to.equal(constraint(graph, 3));
  });

  it("rejects unknown nodes and modes", () => {
    const graph = starGraph(3);

    expect(() => constraint(graph, 7)).to.throw(InvalidNodeError);
    expect(() => Reflect.apply(constraint, undefined, [graph, 1, "sideways"])).to.throw(
      InvalidModeError,
      'got "sideways"',
    );
  });

  describe("dyadicConstraint", () => {
    it("agrees between the node and edge forms", () => {
      const graph = buildNetwork(
        4,
        [
          [1, 2, 3],
          [2, 3, 1],
          [3, 1, 2],
          [3, 4, 5],
        ],
        { directed: true, weighted: true },
      );

      for (const edge of graph.listEdges()) {
        for (const mode of ["both", "out", "in"] as const) {
          expect(dyadicConstraint(graph, edge, mode)).to.equal(dyadicConstraint(graph, edge.from, edge.to, mode));
        }
        expect(dyadicConstraint(graph, edge)).to.equal(dyadicConstraint(graph, edge.from, edge.to, "both"));
      }
    });

    it("is zero between unconnected nodes", () => {
      const graph = buildNetwork(4, [
        [1, 2],
        [3, 4],
      ]);

      expect(dyadicConstraint(graph, 1, 3)).to.equal(0);
    });

    it("includes the two-step term", () => {
      const graph = pathGraph(3);

      expect(dyadicConstraint(graph, 1, 3)).to.equal(0.25);
      expect(dyadicConstraint(graph, 1, 2)).to.equal(1);
    });

    it("depends on the mode for asymmetric ties", () => {
      const graph = buildNetwork(
        3,
        [
          [1, 2],
          [2, 3],
          [1, 3],
        ],
        { directed: true },
      );

      expect(dyadicConstraint(graph, 1, 2, "both")).to.be.closeTo(0.5625, 1e-12);
      expect(dyadicConstraint(graph, 1, 2, "out")).to.be.closeTo(0.25, 1e-12);
      expect(dyadicConstraint(graph, 1, 2, "in")).to.equal(0);
    });
  });
});
