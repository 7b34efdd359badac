import fs from "node:fs/promises";
import path from "node:path";
import * as yaml from "yaml";
import type { z } from "zod";
import {
  EnchantmentRecord,
  PropertyRecord,
  RARITY_TIERS,
  RarityRecord,
  ScrollBaseRecord,
  SpellRecord,
  TableFile,
  WeaponBaseRecord
} from "@relicforge/shared";
import type { RawMapping, TableRow } from "@relicforge/shared";
import { BASE_TIER, DEFAULT_FREQUENCY, WeightedSource } from "@relicforge/engine";
import type { GeneratorSources, ScrollSources, WeaponSources } from "@relicforge/engine";
import type { Logger } from "pino";

export class TableLoadError extends Error {
  constructor(
    readonly file: string,
    reason: string
  ) {
    super(`Cannot load table ${file}: ${reason}`);
    this.name = "TableLoadError";
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseTable(text: string, file: string): TableFile {
  let doc: unknown;
  try {
    doc = yaml.parse(text);
  } catch (err) {
    throw new TableLoadError(file, err instanceof Error ? err.message : String(err));
  }
  const parsed = TableFile.safeParse(doc);
  if (!parsed.success) throw new TableLoadError(file, formatIssues(parsed.error));
  return parsed.data;
}

/** Weight columns for a row: `odds` (1 when absent) fills the default column, `frequencies` override per column. */
export function rowWeights(row: Pick<TableRow, "odds" | "frequencies">): Record<string, number> {
  return { [DEFAULT_FREQUENCY]: row.odds ?? 1, ...row.frequencies };
}

/**
 * Checks every row against the record schema and builds a source keyed by the
 * table's `key` field. Rows keep their raw fields; weights are split off.
 */
export function toWeightedSource(
  table: TableFile,
  record: z.ZodTypeAny,
  file: string
): WeightedSource<RawMapping> {
  const entries = table.rows.map((row, index) => {
    const { odds, frequencies, ...fields } = row;
    const value: RawMapping = fields;
    const checked = record.safeParse(value);
    if (!checked.success) throw new TableLoadError(file, `row ${index + 1}: ${formatIssues(checked.error)}`);
    const key = value[table.key];
    if (typeof key !== "string" && typeof key !== "number") {
      throw new TableLoadError(file, `row ${index + 1} has no "${table.key}" to look it up by`);
    }
    return { value, weights: rowWeights({ odds, frequencies }) };
  });
  return new WeightedSource(entries, {
    name: path.basename(file, path.extname(file)),
    keyOf: (value) => String(value[table.key])
  });
}

export type TableLoader = (name: string, record: z.ZodTypeAny) => Promise<WeightedSource<RawMapping>>;

export function tableLoader(dataDir: string, logger?: Logger): TableLoader {
  return async (name, record) => {
    const file = path.join(dataDir, `${name}.yaml`);
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      throw new TableLoadError(file, err instanceof Error ? err.message : String(err));
    }
    const source = toWeightedSource(parseTable(text, file), record, file);
    logger?.debug({ file, rows: source.size, columns: source.frequencies }, "Loaded table");
    return source;
  };
}

/** Property table file for a tier: `properties/very-rare.yaml`, `properties/base.yaml`. */
export function propertyTableName(tier: string): string {
  return `properties/${tier.replace(/\s+/g, "-")}`;
}

export async function loadWeaponSources(dataDir: string, logger?: Logger): Promise<WeaponSources> {
  const load = tableLoader(dataDir, logger);
  const propertiesByRarity: GeneratorSources["propertiesByRarity"] = {};
  for (const tier of [BASE_TIER, ...RARITY_TIERS]) {
    propertiesByRarity[tier] = await load(propertyTableName(tier), PropertyRecord);
  }
  return {
    bases: await load("weapons", WeaponBaseRecord),
    rarity: await load("rarity", RarityRecord),
    propertiesByRarity,
    enchantments: await load("enchantments", EnchantmentRecord)
  };
}

/** Scrolls carry a spell rather than properties. */
export async function loadScrollSources(dataDir: string, logger?: Logger): Promise<ScrollSources> {
  const load = tableLoader(dataDir, logger);
  return {
    bases: await load("scrolls", ScrollBaseRecord),
    rarity: await load("rarity", RarityRecord),
    propertiesByRarity: {},
    spells: await load("spells", SpellRecord)
  };
}
