/** Source of uniform values in [0, 1). */
export type Rng = () => number;

/** Deterministic PRNG for replayable runs. */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Replays the given values in order, wrapping around. Handy for pinning down random choices. */
export function sequenceRng(values: number[]): Rng {
  if (values.length === 0) throw new RangeError("sequenceRng needs at least one value");
  let i = 0;
  return () => {
    const value = values[i % values.length];
    i += 1;
    return value;
  };
}
