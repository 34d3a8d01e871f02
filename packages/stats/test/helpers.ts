import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { strict as assert } from "node:assert";

import { fromColumns } from "../src/validation.js";
import type { Observation } from "../src/types.js";

interface GroupedFixture {
  readonly values: number[];
  readonly groupSizes: number[];
}

export const loadFixture = (name: string): Observation[] => {
  const path = fileURLToPath(new URL(`./fixtures/${name}.json`, import.meta.url));
  const fixture = JSON.parse(readFileSync(path, { encoding: "utf-8" })) as GroupedFixture;
  const groups = fixture.groupSizes.flatMap((size, index) =>
    Array.from({ length: size }, () => index + 1),
  );
  return fromColumns(fixture.values, groups);
};

export const assertClose = (actual: number, expected: number, tolerance = 1e-9): void => {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${actual} to be within ${tolerance} of ${expected}`,
  );
};
