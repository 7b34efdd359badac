import { describe, it, expect } from "vitest";
import { identityHash } from "./identity";
import { mulberry32, sequenceRng } from "./rng";

describe("mulberry32", () => {
  it("replays the same values for the same seed", () => {
    const a = mulberry32(7);
    const b = mulberry32(7);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((v) => v >= 0 && v < 1)).toBe(true);
  });

  it("varies across seeds", () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });
});

describe("sequenceRng", () => {
  it("cycles through its values", () => {
    const rng = sequenceRng([0.1, 0.2]);
    expect([rng(), rng(), rng()]).toEqual([0.1, 0.2, 0.1]);
  });

  it("needs at least one value", () => {
    expect(() => sequenceRng([])).toThrow(RangeError);
  });
});

describe("identityHash", () => {
  it("is a ten-character url-safe token", () => {
    expect(identityHash(["dagger", "+1", "1d4+1 Piercing"])).toMatch(/^[A-Za-z0-9_-]{10}$/);
  });

  it("depends only on the concatenated parts", () => {
    expect(identityHash(["dag", "ger"])).toBe(identityHash(["dagger"]));
    expect(identityHash(["dagger", "+1"])).not.toBe(identityHash(["dagger", "+2"]));
  });
});
