import type { CuzickResult } from "@cuzick/stats";

import { formatNumber, renderTable } from "./table.js";

export const DIVIDER = "-".repeat(80);

const GROUP_HEADERS = ["Group", "Score", "Samples", "Ranks_sum"] as const;
const STATISTIC_HEADERS = ["L", "T", "E", "Var", "z", "one_tailed_p_values"] as const;

/**
 * Render the group summary and the test statistics as a console report.
 * The ties line only appears when the data contain ties.
 */
export const renderReport = (result: CuzickResult): string => {
  const groupRows = result.groupTable.map((row) =>
    [row.group, row.score, row.samples, row.rankSum].map(formatNumber),
  );
  const statisticRow = [result.L, result.T, result.E, result.Var, result.z, result.pValue].map(
    formatNumber,
  );

  const lines = [
    "CUZICK'S TEST FOR NON PARAMETRIC TREND ANALYSIS",
    DIVIDER,
    ...renderTable(GROUP_HEADERS, groupRows),
    "",
    ...(result.tiesFactor > 0 ? [`Ties factor: ${formatNumber(result.tiesFactor)}`] : []),
    DIVIDER,
    "",
    "CUZICK'S STATISTICS",
    DIVIDER,
    ...renderTable(STATISTIC_HEADERS, [statisticRow]),
  ];

  return `${lines.join("\n")}\n`;
};
