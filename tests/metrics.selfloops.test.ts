import { describe, it } from "mocha";
import { expect } from "chai";

import { constraint } from "../src/metrics/constraint.js";
import { investment, investmentSum } from "../src/metrics/investment.js";
import { egoAlters } from "../src/metrics/ties.js";
import { buildNetwork, type EdgeTuple } from "./helpers/networks.js";

const TRIANGLE_WITH_TAIL: readonly EdgeTuple[] = [
  [1, 2, 1],
  [2, 3, 2],
  [1, 3, 1],
  [3, 4, 4],
];

const LOOPS: readonly EdgeTuple[] = [
  [1, 1, 5],
  [3, 3, 2],
  [4, 4, 1],
];

describe("metrics self-loops", () => {
  for (const directed of [false, true]) {
    it(`leaves every metric unchanged on ${directed ? "directed" : "undirected"} graphs`, () => {
      const plain = buildNetwork(4, TRIANGLE_WITH_TAIL, { directed, weighted: true });
      const looped = buildNetwork(4, [...TRIANGLE_WITH_TAIL, ...LOOPS], { directed, weighted: true });

      for (const mode of ["both", "out", "in"] as const) {
        for (const source of plain.vertices()) {
          expect(constraint(looped, source, mode)).to.equal(constraint(plain, source, mode));
          for (const target of plain.vertices()) {
            expect(investment(looped, source, target, mode)).to.equal(investment(plain, source, target, mode));
            expect(investmentSum(looped, source, target, mode)).to.equal(investmentSum(plain, source, target, mode));
          }
        }
      }
    });
  }

  it("keeps the ego out of its own alters", () => {
    const graph = buildNetwork(2, [
      [1, 1],
      [1, 2],
    ]);

    expect(egoAlters(graph, 1, "both")).to.deep.equal([2]);
    expect(investment(graph, 1, 1)).to.equal(0);
    expect(constraint(graph, 1)).to.equal(1);
  });
});
