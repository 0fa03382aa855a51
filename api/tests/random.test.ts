import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/generator/errors";
import { deriveSeed, fnv1a32, makeRng, patientStream } from "../src/generator/random";

function draws(seed: number, n: number): number[] {
  const rng = makeRng(seed);
  return Array.from({ length: n }, () => rng.next01());
}

describe("fnv1a32", () => {
  it("matches the reference FNV-1a values", () => {
    expect(fnv1a32("")).toBe(0x811c9dc5);
    expect(fnv1a32("a")).toBe(0xe40c292c);
  });
});

describe("makeRng", () => {
  it("replays the same sequence for the same seed", () => {
    expect(draws(1234, 20)).toEqual(draws(1234, 20));
  });

  it("diverges for different seeds", () => {
    expect(draws(1, 5)).not.toEqual(draws(2, 5));
  });

  it("keeps int() inside the inclusive bounds", () => {
    const rng = makeRng(7);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = rng.int(3, 6);
      expect(v).toBeGreaterThanOrEqual(3);
      expect(v).toBeLessThanOrEqual(6);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([3, 4, 5, 6]);
  });

  it("never picks a zero-weight category", () => {
    const rng = makeRng(99);
    for (let i = 0; i < 100; i++) expect(rng.weighted({ never: 0, always: 2 })).toBe("always");
  });

  it("rejects weights that cannot be sampled", () => {
    const rng = makeRng(1);
    expect(() => rng.weighted({ a: 0, b: 0 })).toThrow(ConfigurationError);
    expect(() => rng.weighted({ a: -1, b: 2 })).toThrow(/non-negative/);
    expect(() => rng.weighted({})).toThrow(ConfigurationError);
  });

  it("formats uuids as version 4", () => {
    const rng = makeRng(5);
    for (let i = 0; i < 10; i++) {
      expect(rng.uuid()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    }
  });
});

describe("substreams", () => {
  it("derive distinct seeds per stream and index", () => {
    expect(deriveSeed(42, "patient", 0)).not.toBe(deriveSeed(42, "patient", 1));
    expect(deriveSeed(42, "patient", 0)).not.toBe(deriveSeed(42, "ids", 0));
    expect(deriveSeed(42, "bundle")).toBe(fnv1a32("42::bundle"));
  });

  it("give a patient the same stream no matter what was drawn before", () => {
    const before = patientStream(42, 3).uuid();
    const other = patientStream(42, 2);
    for (let i = 0; i < 50; i++) other.next01();
    expect(patientStream(42, 3).uuid()).toBe(before);
  });
});
