const INDENT = "    ";
const GAP = "    ";
const SIGNIFICANT_DIGITS = 5;

/**
 * Integers print in full; everything else to five significant digits with
 * trailing zeros dropped.
 */
export const formatNumber = (value: number): string => {
  if (!Number.isFinite(value) || Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(SIGNIFICANT_DIGITS)));
};

/**
 * Render a left-aligned table: header, underscore rule, blank line, rows.
 */
export const renderTable = (
  headers: readonly string[],
  rows: ReadonlyArray<readonly string[]>,
): string[] => {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );

  const line = (cells: readonly string[]): string =>
    (INDENT + cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join(GAP)).trimEnd();

  return [
    line(headers),
    line(headers.map((header) => "_".repeat(header.length))),
    "",
    ...rows.map(line),
  ];
};
