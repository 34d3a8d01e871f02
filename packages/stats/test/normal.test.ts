import test from "node:test";
import assert from "node:assert/strict";

import { normalCdf, upperTailProbability } from "../src/normal.js";
import { assertClose } from "./helpers.js";

test("normalCdf matches known quantiles", () => {
  assertClose(normalCdf(0), 0.5, 1e-6);
  assertClose(normalCdf(1.959963984540054), 0.975, 1e-6);
  assertClose(normalCdf(-1.959963984540054), 0.025, 1e-6);
});

test("normalCdf is monotone and bounded", () => {
  let previous = 0;
  for (let z = -6; z <= 6; z += 0.5) {
    const value = normalCdf(z);
    assert.ok(value >= previous, `cdf decreased at z=${z}`);
    assert.ok(value >= 0 && value <= 1);
    previous = value;
  }
});

test("upperTailProbability stays within [0, 1]", () => {
  for (const z of [0, 0.1, 1, 2.5, 8, 40]) {
    const p = upperTailProbability(z);
    assert.ok(p >= 0 && p <= 1, `p=${p} out of range for z=${z}`);
  }
  assertClose(upperTailProbability(2.138089935299395), 0.016254722322859773, 1e-6);
});
