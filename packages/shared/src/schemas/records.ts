import { z } from "zod";

export const NonEmpty = z.string().min(1);

export const RARITY_TIERS = ["common", "uncommon", "rare", "very rare", "legendary"] as const;
export const RarityTier = z.enum(RARITY_TIERS);
export type RarityTier = z.infer<typeof RarityTier>;

export function isRarityTier(value: unknown): value is RarityTier {
  return RarityTier.safeParse(value).success;
}

/** Weight columns a rarity table defines, one per difficulty bracket. */
export const FREQUENCY_KEYS = ["default", "1-4", "5-10", "11-16", "17+"] as const;
export const FrequencyKey = z.enum(FREQUENCY_KEYS);
export type FrequencyKey = z.infer<typeof FrequencyKey>;

const Csv = z.string();
const DiceOrNumber = z.union([z.string(), z.number()]);

export const RarityRecord = z
  .object({
    rarity: RarityTier,
    sort_order: z.number().int().min(0)
  })
  .passthrough();

export type RarityRecord = z.infer<typeof RarityRecord>;

// Free-form: anything besides `name` is flavor or a modifier (override_<attr> included).
export const PropertyRecord = z
  .object({
    name: NonEmpty,
    description: z.string().optional(),
    nouns: Csv.optional(),
    adjectives: Csv.optional(),
    damage: DiceOrNumber.optional(),
    damage_type: z.string().optional(),
    to_hit: DiceOrNumber.optional()
  })
  .passthrough();

export type PropertyRecord = z.infer<typeof PropertyRecord>;

export const WeaponCategory = z.enum(["Simple", "Martial"]);

export const WeaponBaseRecord = z
  .object({
    name: NonEmpty,
    category: WeaponCategory,
    type: z.enum(["Melee", "Ranged"]),
    damage_type: NonEmpty,
    damage: DiceOrNumber,
    range: z.string().optional(),
    weight: z.number().nonnegative().optional(),
    value: z.string().optional(),
    reload: z.string().optional(),
    properties: Csv.optional()
  })
  .passthrough();

export type WeaponBaseRecord = z.infer<typeof WeaponBaseRecord>;

export const EnchantmentRecord = z
  .object({
    name: NonEmpty,
    adjectives: NonEmpty,
    nouns: NonEmpty,
    damage_type: NonEmpty
  })
  .passthrough();

export type EnchantmentRecord = z.infer<typeof EnchantmentRecord>;

export const SpellLevel = z.enum(["cantrip", "1st", "2nd", "3rd", "4th", "5th", "6th", "7th", "8th", "9th"]);
export type SpellLevel = z.infer<typeof SpellLevel>;

export const SpellRecord = z
  .object({
    name: NonEmpty,
    level: SpellLevel,
    school: NonEmpty
  })
  .passthrough();

export type SpellRecord = z.infer<typeof SpellRecord>;

export const ScrollBaseRecord = z
  .object({
    name: NonEmpty
  })
  .passthrough();

export type ScrollBaseRecord = z.infer<typeof ScrollBaseRecord>;
