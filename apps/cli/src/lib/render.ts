const GAP = "  ";
const MIN_COLUMN_WIDTH = 4;

/**
 * Natural column widths, narrowed one character at a time from the widest
 * column until the table fits `width` or every column is at its minimum.
 */
export function columnWidths(cells: readonly string[][], width: number): number[] {
  const columns = Math.max(0, ...cells.map((row) => row.length));
  const widths = Array.from({ length: columns }, (_, col) => Math.max(0, ...cells.map((row) => (row[col] ?? "").length)));
  const total = () => widths.reduce((sum, w) => sum + w, 0) + GAP.length * Math.max(0, columns - 1);
  while (total() > width) {
    const widest = widths.indexOf(Math.max(...widths));
    if (widths[widest] <= MIN_COLUMN_WIDTH) break;
    widths[widest] -= 1;
  }
  return widths;
}

export function clip(text: string, width: number): string {
  if (text.length <= width) return text;
  return `${text.slice(0, Math.max(0, width - 1))}…`;
}

/** Plain-text table: header, a dashed rule, then the body rows. */
export function renderTextTable(cells: readonly string[][], width: number): string {
  const [header, ...body] = cells;
  if (!header) return "";
  const widths = columnWidths(cells, width);
  const line = (row: readonly string[]) =>
    widths.map((w, col) => clip(row[col] ?? "", w).padEnd(w)).join(GAP).trimEnd();
  return [line(header), widths.map((w) => "-".repeat(w)).join(GAP), ...body.map(line)].join("\n");
}
