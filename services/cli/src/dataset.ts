import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { z } from "zod";

import type { Observation } from "@cuzick/stats";

export interface Dataset {
  readonly observations: Observation[];
  readonly scores?: number[];
}

export class DatasetFormatError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

const pairSchema = z.tuple([z.number(), z.number()]);

const jsonSchema = z.union([
  z.array(pairSchema),
  z.object({
    observations: z.array(pairSchema),
    scores: z.array(z.number()).optional(),
  }),
]);

/**
 * Load observations from a CSV (header plus value,group rows) or JSON file
 */
export async function loadDataset(path: string): Promise<Dataset> {
  const content = await readFile(path, { encoding: "utf-8" });
  const extension = extname(path).toLowerCase();

  switch (extension) {
    case ".csv":
      return { observations: parseCsv(content) };
    case ".json":
      return parseJson(content);
    default:
      throw new DatasetFormatError(`Unsupported dataset extension "${extension}" (expected .csv or .json)`);
  }
}

export function parseCsv(content: string): Observation[] {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Remove header row.
  const [, ...rows] = lines;

  return rows.map((row, index): Observation => {
    const cells = row.split(",").map((cell) => cell.trim());
    if (cells.length !== 2) {
      throw new DatasetFormatError(
        `Row ${index + 2} has ${cells.length} columns, expected 2 (value, group)`,
      );
    }
    const [value = "", group = ""] = cells;
    return [toNumber(value), toNumber(group)];
  });
}

export function parseJson(content: string): Dataset {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DatasetFormatError(
      `Dataset is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = jsonSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DatasetFormatError(
      `Dataset JSON must be [value, group] pairs or { observations, scores }: ${
        issue ? `${issue.path.join(".")} ${issue.message}` : "unrecognised shape"
      }`,
    );
  }

  if (Array.isArray(parsed.data)) {
    return { observations: parsed.data };
  }
  return parsed.data.scores === undefined
    ? { observations: parsed.data.observations }
    : { observations: parsed.data.observations, scores: parsed.data.scores };
}

// Empty cells become NaN, which validateInput rejects.
const toNumber = (cell: string): number => (cell.length === 0 ? Number.NaN : Number(cell));
