import { randomInt } from "node:crypto";

export type OrderMode = "random" | "fixed-seeded";

export type OrderOptions =
  | { mode: "random" }
  | { mode: "fixed-seeded"; seed: number };

export function mulberry32(seed: number): () => number {
  return function () {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffle<T>(items: readonly T[], rng: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Permutation of problem ids used for serving. `random` draws a fresh seed
 * each run; `fixed-seeded` replays the committed seed, which is never logged
 * or returned so the private order cannot surface in a public run.
 */
export function buildEvaluationOrder(ids: readonly string[], opts: OrderOptions): string[] {
  const seed = opts.mode === "fixed-seeded" ? opts.seed : randomInt(0, 2 ** 32 - 1);
  return shuffle(ids, mulberry32(seed));
}
