import { ConfigurationError } from "./errors";

export type Rng = {
  next01: () => number;
  int: (min: number, max: number) => number;
  uniform: (min: number, max: number) => number;
  normal: (mean: number, sd: number) => number;
  pick: <T>(items: readonly T[]) => T;
  weighted: (weights: Record<string, number>) => string;
  uuid: () => string;
};

export function fnv1a32(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function deriveSeed(seed: number, stream: string, index?: number): number {
  return fnv1a32(index == null ? `${seed}::${stream}` : `${seed}::${stream}::${index}`);
}

export function makeRng(seed: number): Rng {
  const next = mulberry32(seed);

  function int(min: number, max: number): number {
    const a = Math.ceil(min);
    const b = Math.floor(max);
    return a + Math.floor(next() * (b - a + 1));
  }

  return {
    next01: () => next(),
    int,
    uniform: (min, max) => min + next() * (max - min),
    normal: (mean, sd) => {
      // Box-Muller; 1 - u keeps log() away from zero
      const u = 1 - next();
      const v = next();
      return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    },
    pick: <T>(items: readonly T[]): T => {
      if (items.length === 0) throw new ConfigurationError("Cannot pick from an empty list");
      return items[Math.floor(next() * items.length)] ?? items[0];
    },
    weighted: (weights) => {
      const entries = Object.entries(weights);
      for (const [label, w] of entries) {
        if (!Number.isFinite(w) || w < 0) {
          throw new ConfigurationError(`Weight for "${label}" must be a non-negative number`);
        }
      }
      const total = entries.reduce((s, [, w]) => s + w, 0);
      if (total <= 0) {
        throw new ConfigurationError(`Categorical weights are all zero (${entries.map(([k]) => k).join(", ") || "no categories"})`);
      }
      let r = next() * total;
      let last = entries[0][0];
      for (const [label, w] of entries) {
        if (w <= 0) continue;
        last = label;
        r -= w;
        if (r < 0) return label;
      }
      return last;
    },
    uuid: () => {
      const bytes: number[] = [];
      for (let i = 0; i < 16; i++) bytes.push(int(0, 255));
      bytes[6] = (bytes[6] & 0x0f) | 0x40;
      bytes[8] = (bytes[8] & 0x3f) | 0x80;
      const hex = bytes.map((b) => b.toString(16).padStart(2, "0")).join("");
      return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
    },
  };
}

export function patientStream(seed: number, patientIndex: number): Rng {
  return makeRng(deriveSeed(seed, "patient", patientIndex));
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
