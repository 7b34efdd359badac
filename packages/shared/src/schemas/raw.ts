import { z } from "zod";

/**
 * Raw attribute values as authored in data tables, before any template is rendered.
 */
export type RawScalar = string | number | boolean | null;
export type RawValue = RawScalar | RawValue[] | RawMapping;
export type RawMapping = { [key: string]: RawValue };

export const RawScalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RawValue: z.ZodType<RawValue> = z.lazy(() =>
  z.union([RawScalar, z.array(RawValue), z.record(RawValue)])
);

export const RawMapping: z.ZodType<RawMapping> = z.record(RawValue);

export function isRawMapping(value: RawValue | undefined): value is RawMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
