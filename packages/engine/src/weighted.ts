import type { Rng } from "./rng";
import { EmptySourceError } from "./errors";

export const DEFAULT_FREQUENCY = "default";

export type WeightedEntry<T> = {
  value: T;
  /** Weight per frequency column; `default` backs any column the entry leaves out. */
  weights: Record<string, number>;
};

export type WeightedSourceOptions<T> = {
  name?: string;
  keyOf?: (value: T) => string;
};

function columnWeight(weights: Record<string, number>, frequency: string): number {
  const w = weights[frequency] ?? weights[DEFAULT_FREQUENCY] ?? 0;
  return Number.isFinite(w) ? Math.max(0, w) : 0;
}

/**
 * A read-only table of candidate values with one or more weight columns.
 *
 * The column is chosen per call, so two callers sampling the same table under
 * different difficulty brackets never step on each other.
 */
export class WeightedSource<T> {
  readonly name: string;
  private readonly entries: ReadonlyArray<WeightedEntry<T>>;
  private readonly index = new Map<string, T>();
  private readonly keyOf: ((value: T) => string) | null;

  constructor(entries: Iterable<WeightedEntry<T>>, options: WeightedSourceOptions<T> = {}) {
    this.name = options.name ?? "anonymous";
    this.entries = Array.from(entries, (e) => ({ value: e.value, weights: { ...e.weights } }));
    this.keyOf = options.keyOf ?? null;
    if (this.keyOf) {
      for (const entry of this.entries) {
        const key = this.keyOf(entry.value);
        if (!this.index.has(key)) this.index.set(key, entry.value);
      }
    }
  }

  get members(): T[] {
    return this.entries.map((e) => e.value);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Every frequency column any entry defines. */
  get frequencies(): string[] {
    const keys = new Set<string>();
    for (const entry of this.entries) for (const key of Object.keys(entry.weights)) keys.add(key);
    return [...keys];
  }

  get(key: string): T | undefined {
    return this.index.get(key);
  }

  keyFor(value: T): string {
    return this.keyOf ? this.keyOf(value) : String(value);
  }

  /** Values that can still come up under a frequency column, in table order. */
  available(frequency: string = DEFAULT_FREQUENCY): T[] {
    return this.entries.filter((entry) => columnWeight(entry.weights, frequency) > 0).map((entry) => entry.value);
  }

  /** Distinct keys that can still come up under a frequency column. */
  availableKeys(frequency: string = DEFAULT_FREQUENCY): string[] {
    return [...new Set(this.available(frequency).map((value) => this.keyFor(value)))];
  }

  random(rng: Rng, frequency: string = DEFAULT_FREQUENCY): T {
    const weighted = this.entries
      .map((entry) => ({ value: entry.value, weight: columnWeight(entry.weights, frequency) }))
      .filter((x) => x.weight > 0);
    if (!weighted.length) throw new EmptySourceError(this.name, frequency);
    const total = weighted.reduce((s, x) => s + x.weight, 0);
    let r = rng() * total;
    for (const x of weighted) {
      r -= x.weight;
      if (r < 0) return x.value;
    }
    return weighted[weighted.length - 1].value;
  }
}

export type EqualWeightsOptions = {
  name?: string;
  /** Keep empty values instead of dropping them. */
  blank?: boolean;
};

export function equalWeights(values: Iterable<string>, options: EqualWeightsOptions = {}): WeightedSource<string> {
  const cleaned = Array.from(values, (v) => v.trim()).filter((v) => options.blank || v.length > 0);
  return new WeightedSource(
    cleaned.map((value) => ({ value, weights: { [DEFAULT_FREQUENCY]: 1 } })),
    { name: options.name, keyOf: (v) => v }
  );
}

export function splitCsv(csv: string): string[] {
  return csv
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
}

/** One value from a comma-separated list. */
export function randomFromCsv(csv: string, rng: Rng): string {
  return equalWeights(csv.split(","), { name: "csv" }).random(rng);
}
