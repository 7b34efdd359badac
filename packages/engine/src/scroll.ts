import type { RarityTier, RawMapping } from "@relicforge/shared";
import { isRarityTier, isRawMapping } from "@relicforge/shared";
import { ItemGenerator } from "./generator";
import type { GeneratorOptions, GeneratorSources } from "./generator";
import { Item } from "./item";
import { titleCase } from "./template";
import type { WeightedSource } from "./weighted";

/** Spell table column per tier, named for the highest spell level it allows. */
export const SPELL_FREQUENCY_BY_RARITY: Record<RarityTier, string> = {
  common: "first",
  uncommon: "third",
  rare: "fifth",
  "very rare": "seventh",
  legendary: "ninth"
};

export class Scroll extends Item {
  override get name(): string {
    return titleCase(this.baseName);
  }

  override get summary(): string {
    const level = this.attributes.text("spell.level") ?? "";
    const school = this.attributes.text("spell.school") ?? "";
    if (level === "cantrip") return `${this.name} (${school} cantrip)`;
    return `${this.name} (${level} level ${school})`;
  }

  override get details(): string {
    return this.summary;
  }
}

export type ScrollSources = GeneratorSources & {
  spells: WeightedSource<RawMapping>;
};

/** Every scroll carries one spell, no stronger than its rarity allows. */
export class ScrollGenerator extends ItemGenerator<Scroll> {
  private readonly spells: WeightedSource<RawMapping>;

  constructor(sources: ScrollSources, options: GeneratorOptions = {}) {
    super(sources, (attributes, itemOptions) => new Scroll(attributes, itemOptions), options);
    this.spells = sources.spells;
    this.registerProvider("spell", (attrs) => this.randomSpell(attrs));
  }

  randomSpell(attrs: Readonly<RawMapping>): RawMapping {
    const rarity = attrs.rarity;
    const tier = isRawMapping(rarity) ? rarity.rarity : rarity;
    const frequency = isRarityTier(tier) ? SPELL_FREQUENCY_BY_RARITY[tier] : SPELL_FREQUENCY_BY_RARITY.common;
    return structuredClone(this.spells.random(this.rng, frequency));
  }
}
