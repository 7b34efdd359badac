import { z } from "zod";
import { RawValue } from "./raw";

export const Odds = z.number().nonnegative();
export const Frequencies = z.record(Odds);

/**
 * One row of a human-authored table. `odds` is the default column (1 when
 * absent); `frequencies` overrides individual columns.
 */
export const TableRow = z
  .object({
    odds: Odds.optional(),
    frequencies: Frequencies.optional()
  })
  .catchall(RawValue);

export type TableRow = z.infer<typeof TableRow>;

export const TableFile = z
  .object({
    key: z.string().min(1).default("name"),
    rows: z.array(TableRow).min(1)
  })
  .strict();

export type TableFile = z.infer<typeof TableFile>;
