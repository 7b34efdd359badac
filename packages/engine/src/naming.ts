import type { AttributeNode } from "./attributes";
import type { Rng } from "./rng";
import { renderTemplate, titleCase } from "./template";
import { equalWeights, WeightedSource } from "./weighted";

export type Descriptors = {
  nouns: Map<string, WeightedSource<string>>;
  adjectives: Map<string, WeightedSource<string>>;
};

export type SelectedDescriptors = {
  nouns: string;
  adjectives: string;
  /** How many properties lent a word to the name. */
  contributors: number;
};

/** Uniform choices over each property's comma-separated `nouns` and `adjectives`. */
export function collectDescriptors(properties: Iterable<[string, AttributeNode]>): Descriptors {
  const nouns = new Map<string, WeightedSource<string>>();
  const adjectives = new Map<string, WeightedSource<string>>();
  for (const [name, prop] of properties) {
    const n = equalWeights((prop.text("nouns") ?? "").split(","), { name: `${name}.nouns` });
    if (n.size) nouns.set(name, n);
    const a = equalWeights((prop.text("adjectives") ?? "").split(","), { name: `${name}.adjectives` });
    if (a.size) adjectives.set(name, a);
  }
  return { nouns, adjectives };
}

/**
 * Picks the words a name is built from. Each property gives at most one noun.
 * A property offering both kinds usually gives one or the other; only about
 * one draw in five gives both ("Thundering Dagger of Thunder").
 */
export function selectDescriptors(descriptors: Descriptors, rng: Rng): SelectedDescriptors {
  const nouns: string[] = [];
  const adjectives: string[] = [];
  const seenNouns = new Set<string>();
  const contributors = new Set<string>();

  const addNoun = (prop: string, source: WeightedSource<string>) => {
    if (seenNouns.has(prop)) return;
    nouns.push(source.random(rng).trim());
    seenNouns.add(prop);
    contributors.add(prop);
  };
  const addAdjective = (prop: string, source: WeightedSource<string>) => {
    adjectives.push(source.random(rng).trim());
    contributors.add(prop);
  };

  const names = new Set([...descriptors.nouns.keys(), ...descriptors.adjectives.keys()]);
  for (const prop of names) {
    const n = descriptors.nouns.get(prop);
    const a = descriptors.adjectives.get(prop);
    if (n && !a) {
      addNoun(prop, n);
    } else if (a && !n) {
      addAdjective(prop, a);
    } else if (n && a) {
      const roll = rng();
      if (roll <= 0.4 && !seenNouns.has(prop)) {
        addNoun(prop, n);
      } else if (roll <= 0.8) {
        addAdjective(prop, a);
      } else {
        addNoun(prop, n);
        addAdjective(prop, a);
      }
    }
  }

  return { nouns: nouns.join(" and "), adjectives: adjectives.join(" "), contributors: contributors.size };
}

export type NameTemplateOptions = {
  withNouns: boolean;
  withAdjectives: boolean;
  contributors: number;
};

/**
 * Name templates that fit the words on hand. Mostly the familiar shapes
 * ("Venomous Shortsword", "Dagger of Shocks"); with several contributing
 * properties the long forms compete.
 */
export function nameTemplates(options: NameTemplateOptions): WeightedSource<string> {
  const choices: Array<[string, number]> = [];
  if (options.withNouns && !options.withAdjectives) choices.push(["{name} of {nouns}", 0.5]);
  if (options.withAdjectives && !options.withNouns) choices.push(["{adjectives} {name}", 0.5]);
  if (options.withNouns && options.withAdjectives) {
    choices.push(["{adjectives} {name} of {nouns}", 1.0]);
    if (options.contributors > 1) choices.push(["{name} of {adjectives} {nouns}", 0.5]);
  }
  return new WeightedSource(
    choices.map(([value, weight]) => ({ value, weights: { default: weight } })),
    { name: "name templates", keyOf: (v) => v }
  );
}

/** A flavorful display name, or the base name when no property offers words. */
export function randomName(baseName: string, properties: Iterable<[string, AttributeNode]>, rng: Rng): string {
  const picked = selectDescriptors(collectDescriptors(properties), rng);
  if (!picked.nouns && !picked.adjectives) return baseName;
  const template = nameTemplates({
    withNouns: Boolean(picked.nouns),
    withAdjectives: Boolean(picked.adjectives),
    contributors: picked.contributors
  }).random(rng);
  const words: Record<string, string> = { name: baseName, nouns: picked.nouns, adjectives: picked.adjectives };
  return titleCase(renderTemplate(template, ([key]) => words[key] ?? ""));
}
