import { RarityRecord } from "@relicforge/shared";
import type { FrequencyKey, RarityTier, RawMapping, RawValue } from "@relicforge/shared";
import { findRequirements, PROPERTIES_KEY, resolveAttributes } from "./attributes";
import type { AttributeNode } from "./attributes";
import { MissingProviderError, UnknownPropertyError } from "./errors";
import type { Item, ItemOptions } from "./item";
import type { Rng } from "./rng";
import { DEFAULT_FREQUENCY, splitCsv, WeightedSource } from "./weighted";

/** Property table holding the intrinsic properties a base can name. */
export const BASE_TIER = "base";

const MAX_DRAWS_PER_PROPERTY = 50;

export type GeneratorSources = {
  bases: WeightedSource<RawMapping>;
  rarity: WeightedSource<RawMapping>;
  /** One table per rarity tier, plus `base` for intrinsic properties. */
  propertiesByRarity: Partial<Record<string, WeightedSource<RawMapping>>>;
};

export type PropertyCountTable = Record<RarityTier, Array<{ count: number; weight: number }>>;

export const DEFAULT_PROPERTY_COUNTS: PropertyCountTable = {
  common: [
    { count: 0, weight: 0.9 },
    { count: 1, weight: 0.1 }
  ],
  uncommon: [{ count: 1, weight: 1 }],
  rare: [
    { count: 1, weight: 0.6 },
    { count: 2, weight: 0.4 }
  ],
  "very rare": [
    { count: 1, weight: 0.1 },
    { count: 2, weight: 0.7 },
    { count: 3, weight: 0.2 }
  ],
  legendary: [
    { count: 2, weight: 0.5 },
    { count: 3, weight: 0.5 }
  ]
};

/**
 * Supplies an attribute that templates reference but no table provides.
 * Receives the mapping assembled so far.
 */
export type RequirementProvider = (attributes: Readonly<RawMapping>) => RawValue;

export type ItemFactory<T extends Item> = (attributes: AttributeNode, options: ItemOptions) => T;

export type GeneratorOptions = {
  rng?: Rng;
  propertyCounts?: PropertyCountTable;
  /** Used in error messages; defaults to the class name. */
  name?: string;
};

export type RandomOptions = {
  /** Difficulty (challenge rating); picks the rarity table's weight column. */
  difficulty?: number;
  /** Skip the rarity draw and use this tier. */
  rarity?: RarityTier;
};

/**
 * A record's own `field` (`name` for properties), so sampled records are
 * keyed the same whether or not the table was built with a `keyOf`.
 */
export function recordKey(source: WeightedSource<RawMapping>, record: RawMapping, field = "name"): string {
  const own = record[field];
  return typeof own === "string" || typeof own === "number" ? String(own) : source.keyFor(record);
}

/** Exact lookup by key, falling back to a scan of `field` for tables without a `keyOf`. */
export function findRecord(source: WeightedSource<RawMapping>, key: string, field = "name"): RawMapping | undefined {
  return source.get(key) ?? source.members.find((record) => recordKey(source, record, field) === key);
}

export function frequencyForDifficulty(difficulty?: number): FrequencyKey {
  if (!difficulty || difficulty <= 0) return "default";
  if (difficulty <= 4) return "1-4";
  if (difficulty <= 10) return "5-10";
  if (difficulty <= 16) return "11-16";
  return "17+";
}

export class ItemGenerator<T extends Item> {
  readonly name: string;
  protected readonly sources: GeneratorSources;
  protected readonly rng: Rng;
  private readonly factory: ItemFactory<T>;
  private readonly propertyCounts: PropertyCountTable;
  private readonly providers = new Map<string, RequirementProvider>();

  constructor(sources: GeneratorSources, factory: ItemFactory<T>, options: GeneratorOptions = {}) {
    this.sources = sources;
    this.factory = factory;
    this.rng = options.rng ?? Math.random;
    this.propertyCounts = options.propertyCounts ?? DEFAULT_PROPERTY_COUNTS;
    this.name = options.name ?? new.target.name;
  }

  /** Makes `requirement` available to templates that reference it. Replaces any earlier provider. */
  registerProvider(requirement: string, provider: RequirementProvider): this {
    this.providers.set(requirement, provider);
    return this;
  }

  hasProvider(requirement: string): boolean {
    return this.providers.has(requirement);
  }

  random(count = 1, options: RandomOptions = {}): T[] {
    const items: T[] = [];
    for (let i = 0; i < count; i++) items.push(this.build(this.randomAttributes(options)));
    return items;
  }

  /** Resolves a mapping into an item without any sampling. */
  build(raw: RawMapping): T {
    return this.factory(resolveAttributes(raw), { rng: this.rng });
  }

  randomAttributes(options: RandomOptions = {}): RawMapping {
    const frequency = frequencyForDifficulty(options.difficulty);
    const { [PROPERTIES_KEY]: intrinsic, ...base } = structuredClone(this.sources.bases.random(this.rng));
    const rarity = options.rarity ? this.rarityRecord(options.rarity) : this.randomRarity(frequency);
    const tier = RarityRecord.parse(rarity).rarity;

    const properties = this.randomProperties(tier);
    Object.assign(properties, this.intrinsicProperties(intrinsic));

    const attrs = this.prepareAttributes({ ...base, rarity, [PROPERTIES_KEY]: properties });
    return this.resolveRequirements(attrs);
  }

  /** Hook for subclasses to fill in defaults before requirements are looked up. */
  protected prepareAttributes(attrs: RawMapping): RawMapping {
    return attrs;
  }

  protected randomRarity(frequency: string): RawMapping {
    return structuredClone(this.sources.rarity.random(this.rng, frequency));
  }

  protected rarityRecord(tier: RarityTier): RawMapping {
    const record = findRecord(this.sources.rarity, tier, "rarity");
    if (!record) throw new UnknownPropertyError("rarity", tier);
    return structuredClone(record);
  }

  /** How many properties an item of this tier gets, capped by what the tier's table can offer. */
  protected propertyCount(tier: RarityTier): number {
    const source = this.sources.propertiesByRarity[tier];
    const available = source ? new Set(source.available().map((prop) => recordKey(source, prop))).size : 0;
    const rows = this.propertyCounts[tier];
    if (!rows.length) return 0;
    const counts = new WeightedSource(
      rows.map((row) => ({ value: row.count, weights: { [DEFAULT_FREQUENCY]: row.weight } })),
      { name: `${tier} property counts` }
    );
    return Math.min(counts.random(this.rng), available);
  }

  /**
   * Distinct properties drawn from the tier's table, keyed by property name.
   * Duplicates are redrawn; after MAX_DRAWS_PER_PROPERTY draws per wanted
   * property the rest are taken in table order.
   */
  protected randomProperties(tier: RarityTier): RawMapping {
    const properties: RawMapping = {};
    const source = this.sources.propertiesByRarity[tier];
    const target = this.propertyCount(tier);
    if (!source || target === 0) return properties;
    let draws = target * MAX_DRAWS_PER_PROPERTY;
    while (Object.keys(properties).length < target && draws-- > 0) {
      const prop = source.random(this.rng);
      const key = recordKey(source, prop);
      if (!(key in properties)) properties[key] = structuredClone(prop);
    }
    for (const prop of source.available()) {
      if (Object.keys(properties).length >= target) break;
      const key = recordKey(source, prop);
      if (!(key in properties)) properties[key] = structuredClone(prop);
    }
    return properties;
  }

  /** Looks up, without any randomness, the properties a base names as intrinsic. */
  protected intrinsicProperties(names: RawValue | undefined): RawMapping {
    const properties: RawMapping = {};
    if (typeof names !== "string") return properties;
    const source = this.sources.propertiesByRarity[BASE_TIER];
    for (const name of splitCsv(names)) {
      const prop = source && findRecord(source, name);
      if (!prop) throw new UnknownPropertyError(BASE_TIER, name);
      properties[name] = structuredClone(prop);
    }
    return properties;
  }

  /** Fills every requirement from its provider; a provider may introduce further requirements. */
  protected resolveRequirements(attrs: RawMapping): RawMapping {
    const next: RawMapping = { ...attrs };
    for (;;) {
      const pending = findRequirements(next).filter((req) => !(req in next));
      if (!pending.length) return next;
      for (const req of pending) {
        const provider = this.providers.get(req);
        if (!provider) throw new MissingProviderError(this.name, req);
        next[req] = provider(next);
      }
    }
  }
}
