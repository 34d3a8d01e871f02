/**
 * Boundary checks for the observation set and the score vector
 *
 * Shape is checked with zod; the label and score rules that depend on the
 * whole data set are checked afterwards, in a fixed order, so the first
 * violation found is the one reported.
 */

import { z } from "zod";

import { CuzickError } from "./errors.js";
import type { Observation, ValidatedInput } from "./types.js";

const observationSchema = z.tuple([z.number().finite(), z.number().finite()]);

const observationsSchema = z.array(observationSchema).nonempty();

const scoresSchema = z.array(z.number().finite());

const describeIssue = (prefix: string, error: z.ZodError): CuzickError => {
  const issue = error.issues[0];
  const path = [prefix, ...(issue?.path ?? [])].join(".");
  return new CuzickError("InvalidShape", `Invalid ${path}: ${issue?.message ?? "malformed input"}`, {
    path,
    expected:
      prefix === "score"
        ? "array of finite numbers"
        : "non-empty array of [value, group] pairs of finite numbers",
  });
};

/**
 * Builds an observation set from parallel value and group columns
 */
export const fromColumns = (
  values: readonly number[],
  groups: readonly number[],
): Observation[] => {
  if (values.length !== groups.length) {
    throw new CuzickError(
      "InvalidShape",
      `Value and group columns differ in length (${values.length} vs ${groups.length})`,
      { values: values.length, groups: groups.length },
    );
  }
  return values.map((value, index): Observation => [value, groups[index] ?? Number.NaN]);
};

/**
 * Validate observations and scores, synthesising the default score 1..k when
 * none is supplied.
 */
export function validateInput(observations: unknown, scores?: unknown): ValidatedInput {
  const parsedObservations = observationsSchema.safeParse(observations);
  if (!parsedObservations.success) {
    throw describeIssue("observations", parsedObservations.error);
  }

  let parsedScores: number[] = [];
  if (scores !== undefined && scores !== null) {
    const result = scoresSchema.safeParse(scores);
    if (!result.success) {
      throw describeIssue("score", result.error);
    }
    parsedScores = result.data;
  }

  const rows: readonly Observation[] = parsedObservations.data;

  for (const [index, [, label]] of rows.entries()) {
    if (!Number.isInteger(label)) {
      throw new CuzickError(
        "NonIntegerLabel",
        `Group label ${label} at row ${index} is not a whole number`,
        { row: index, label },
      );
    }
  }

  const labels = Array.from(new Set(rows.map(([, label]) => label))).sort((a, b) => a - b);
  const k = labels.length;
  const minLabel = labels[0];
  const maxLabel = labels[k - 1];
  if (minLabel !== 1 || maxLabel !== k) {
    throw new CuzickError(
      "NonConsecutiveLabels",
      `Group labels must be consecutive integers 1..${k} without gaps, got ${labels.join(", ")}`,
      { labels, expected: { min: 1, max: k } },
    );
  }

  if (parsedScores.length === 0) {
    return {
      observations: rows,
      scores: Array.from({ length: k }, (_, index) => index + 1),
      groups: k,
    };
  }

  if (parsedScores.length !== k) {
    throw new CuzickError(
      "ScoreLengthMismatch",
      `Score length ${parsedScores.length} does not match the number of groups (${k})`,
      { length: parsedScores.length, expected: k },
    );
  }

  if (new Set(parsedScores).size < 2) {
    throw new CuzickError(
      "DegenerateScore",
      "Score must not be constant: use at least two distinct values",
      { scores: parsedScores },
    );
  }

  return { observations: rows, scores: parsedScores, groups: k };
}
