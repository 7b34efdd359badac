import type { RawMapping } from "@relicforge/shared";
import { identityHash } from "./identity";
import { Item } from "./item";
import { ItemGenerator } from "./generator";
import type { GeneratorOptions, GeneratorSources } from "./generator";
import { randomName } from "./naming";
import { randomFromCsv } from "./weighted";
import type { WeightedSource } from "./weighted";

/**
 * A weapon, magical or mundane. Most of what it adds over a plain item is
 * naming and the one-line attack summary.
 */
export class Weapon extends Item {
  private cachedName: string | null = null;
  private cachedId: string | null = null;

  /**
   * A random name built from the properties' nouns and adjectives. Chosen on
   * first read and kept, since the same properties allow several names.
   */
  override get name(): string {
    if (this.cachedName === null) this.cachedName = randomName(this.baseName, this.properties, this.rng);
    return this.cachedName;
  }

  /** Total attack bonus: a flat number, dice, or both ("+2", "+0+1d4", "+1+1d6"). */
  get toHit(): string {
    if (!this.hasProperties) return "";
    let bonus = 0;
    let dice = "";
    for (const [, prop] of this.properties) {
      const mod = prop.get("to_hit");
      if (!mod) continue;
      if (mod.kind === "scalar" && typeof mod.value === "number") bonus += mod.value;
      else if (mod.kind === "text" && mod.value) dice += `+${mod.value}`;
    }
    return `+${bonus}${dice}`;
  }

  /**
   * Damage per hit, grouped by damage type in the order types first appear:
   * "1d6+1 Slashing + 1d4 Thunder + 3 Poison".
   */
  get damageDice(): string {
    if (!this.hasProperties) return "";
    const damage = new Map<string, string>();
    damage.set(this.attributes.text("damage_type") ?? "", this.attributes.text("damage") ?? "");
    for (const [, prop] of this.properties) {
      const mod = prop.text("damage");
      if (!mod) continue;
      const key = prop.text("damage_type") ?? "";
      const current = damage.get(key);
      damage.set(key, current ? `${current}+${mod}` : mod);
    }
    return [...damage].map(([type, dice]) => `${dice} ${type}`.trim()).join(" + ");
  }

  get range(): string {
    return this.attributes.text("range") ?? "";
  }

  get targets(): string {
    return this.attributes.text("targets") ?? "";
  }

  get category(): string {
    return this.attributes.text("category") ?? "";
  }

  /** "+2 to hit, 5 ft., 1 tgts. 1d6+2 Piercing + 1d6 Fire" */
  override get summary(): string {
    return `${this.toHit} to hit, ${this.range} ft., ${this.targets} tgts. ${this.damageDice}`;
  }

  override get details(): string {
    const props = this.properties.map(([name]) => name).join(", ");
    return [
      this.name,
      ` * ${this.rarity ?? "unknown"} ${this.category} weapon (${props})`,
      ` * ${this.summary}`,
      `\n${this.description}\n`
    ].join("\n");
  }

  /**
   * Identical for every weapon with the same base and the same attack, however
   * it ended up named. Useful as a lookup key or a short link.
   */
  get id(): string {
    if (this.cachedId === null) this.cachedId = identityHash([this.baseName, this.toHit, this.damageDice]);
    return this.cachedId;
  }
}

export type WeaponSources = GeneratorSources & {
  enchantments: WeightedSource<RawMapping>;
};

export class WeaponGenerator extends ItemGenerator<Weapon> {
  private readonly enchantments: WeightedSource<RawMapping>;

  constructor(sources: WeaponSources, options: GeneratorOptions = {}) {
    super(sources, (attributes, itemOptions) => new Weapon(attributes, itemOptions), options);
    this.enchantments = sources.enchantments;
    this.registerProvider("enchantment", () => this.randomEnchantment());
  }

  /** One enchantment, narrowed to a single adjective and noun so every property reading it agrees. */
  randomEnchantment(): RawMapping {
    const enchantment = structuredClone(this.enchantments.random(this.rng));
    const { adjectives, nouns } = enchantment;
    if (typeof adjectives === "string") enchantment.adjectives = randomFromCsv(adjectives, this.rng);
    if (typeof nouns === "string") enchantment.nouns = randomFromCsv(nouns, this.rng);
    return enchantment;
  }

  protected override prepareAttributes(attrs: RawMapping): RawMapping {
    const next: RawMapping = { ...attrs, targets: attrs.targets ?? 1 };
    if (next.category === "Martial" && !next.range) next.range = "";
    return next;
  }
}
