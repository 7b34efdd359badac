import * as yaml from "yaml";
import type { ItemView } from "@relicforge/engine";
import type { OutputFormat } from "./args";
import { renderTextTable } from "./render";

export const COLUMNS = ["Roll", "Name", "Rarity", "Summary"] as const;

export type RollTableRow = {
  /** A single face ("7") or a run of faces ("3-5"). */
  roll: string;
  name: string;
  rarity: string;
  summary: string;
};

export type RollTableOptions = {
  hideRolls?: boolean;
};

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Rarest last; items of one tier by name. */
export function sortItems(items: readonly ItemView[]): ItemView[] {
  return [...items].sort((a, b) => a.sortOrder - b.sortOrder || compareText(a.name, b.name));
}

function sameResult(a: ItemView, b: ItemView): boolean {
  return a.name === b.name && a.rarity === b.rarity && a.summary === b.summary;
}

/**
 * Assigns die faces 1..n to the items in table order. Collapsed tables merge
 * consecutive identical results into one row covering a range of faces.
 */
export function rollRows(items: readonly ItemView[], collapsed = true): RollTableRow[] {
  const sorted = sortItems(items);
  const rows: RollTableRow[] = [];
  let first = 1;
  for (let i = 0; i < sorted.length; i++) {
    const item = sorted[i];
    const next = sorted[i + 1];
    if (collapsed && next && sameResult(item, next)) continue;
    const last = i + 1;
    rows.push({
      roll: first === last ? String(last) : `${first}-${last}`,
      name: item.name,
      rarity: item.rarity ?? "",
      summary: item.summary
    });
    first = last + 1;
  }
  return rows;
}

/** Header row first, then one row of cells per table row. */
export function tableCells(rows: readonly RollTableRow[], options: RollTableOptions = {}): string[][] {
  const header: string[] = options.hideRolls ? COLUMNS.slice(1) : [...COLUMNS];
  const body = rows.map((row) => {
    const cells = [row.name, row.rarity, row.summary];
    return options.hideRolls ? cells : [row.roll, ...cells];
  });
  return [header, ...body];
}

export function asMarkdown(rows: readonly RollTableRow[], options: RollTableOptions = {}): string {
  const [header, ...body] = tableCells(rows, options);
  const line = (cells: string[]) => `| ${cells.map((cell) => cell.replace(/\|/g, "\\|")).join(" | ")} |`;
  return [line(header), line(header.map(() => "---")), ...body.map(line)].join("\n");
}

export function asYaml(rows: readonly RollTableRow[], options: RollTableOptions = {}): string {
  return yaml.stringify(
    rows.map(({ roll, ...rest }) => (options.hideRolls ? rest : { roll, ...rest }))
  );
}

export type RenderOptions = RollTableOptions & {
  output: OutputFormat;
  /** Total width of text output. */
  width: number;
};

export function renderRollTable(rows: readonly RollTableRow[], options: RenderOptions): string {
  switch (options.output) {
    case "yaml":
      return asYaml(rows, options);
    case "markdown":
      return asMarkdown(rows, options);
    case "text":
      return renderTextTable(tableCells(rows, options), options.width);
  }
}
