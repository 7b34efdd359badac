import { isRarityTier, RARITY_TIERS } from "@relicforge/shared";
import type { RarityTier, RawMapping } from "@relicforge/shared";
import { AttributeNode, PROPERTIES_KEY, resolveAttributes } from "./attributes";
import type { AttrValue } from "./attributes";
import type { Rng } from "./rng";
import { titleCase } from "./template";

export type ItemOptions = {
  /** Drives flavor choices made after resolution, such as a weapon's name. */
  rng?: Rng;
};

/** What presentation code reads from a generated item. */
export interface ItemView {
  readonly name: string;
  readonly summary: string;
  readonly description: string;
  readonly details: string;
  readonly rarity: RarityTier | undefined;
  readonly sortOrder: number;
  readonly id?: string;
}

export type ItemConstructor<T extends Item> = new (attributes: AttributeNode, options?: ItemOptions) => T;

export class Item implements ItemView {
  readonly attributes: AttributeNode;
  protected readonly rng: Rng;

  constructor(attributes: AttributeNode, options: ItemOptions = {}) {
    this.attributes = attributes;
    this.rng = options.rng ?? Math.random;
  }

  static fromAttributes<T extends Item>(this: ItemConstructor<T>, raw: RawMapping, options?: ItemOptions): T {
    return new this(resolveAttributes(raw), options);
  }

  get(path: string): AttrValue | undefined {
    return this.attributes.get(path);
  }

  /** The rendered name from the item's attributes, before any flavor is added. */
  get baseName(): string {
    return this.attributes.name ?? "";
  }

  get name(): string {
    return this.baseName;
  }

  get rarity(): RarityTier | undefined {
    const tier = this.attributes.text("rarity.rarity") ?? this.attributes.text("rarity");
    return isRarityTier(tier) ? tier : undefined;
  }

  get sortOrder(): number {
    const explicit = this.attributes.number("rarity.sort_order");
    if (explicit !== undefined) return explicit;
    const tier = this.rarity;
    return tier ? RARITY_TIERS.indexOf(tier) : 0;
  }

  get hasProperties(): boolean {
    return this.attributes.has(PROPERTIES_KEY);
  }

  /** Property nodes keyed by property name, in the order they were attached. */
  get properties(): Array<[string, AttributeNode]> {
    const node = this.attributes.node(PROPERTIES_KEY);
    if (!node) return [];
    return node.entries().flatMap(([key, value]): Array<[string, AttributeNode]> =>
      value.kind === "node" ? [[key, value.value]] : []
    );
  }

  get description(): string {
    const lines: string[] = [];
    const own = this.attributes.text("description");
    if (own) lines.push(own);
    for (const [name, prop] of this.properties) {
      const text = prop.text("description");
      if (text) lines.push(`${titleCase(name)}. ${text}`);
    }
    return lines.join("\n");
  }

  get summary(): string {
    return this.name;
  }

  get details(): string {
    return [this.name, this.description].filter(Boolean).join("\n");
  }
}
