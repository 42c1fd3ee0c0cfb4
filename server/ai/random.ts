/**
 * Randomness shared by topic sampling, option padding and the built-in
 * generators. Pass a seed to get a repeatable stream.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number;
  pick<T>(values: readonly T[]): T;
  /** `k` distinct elements in random order, without replacement */
  sample<T>(values: readonly T[], k: number): T[];
  /** Shuffled copy; the input is left untouched */
  shuffle<T>(values: readonly T[]): T[];
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed?: number): RandomSource {
  const next = seed === undefined ? Math.random : mulberry32(seed);

  const int = (min: number, max: number) => {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    if (hi < lo) {
      throw new RangeError(`Empty integer range [${min}, ${max}]`);
    }
    return lo + Math.floor(next() * (hi - lo + 1));
  };

  const shuffle = <T,>(values: readonly T[]): T[] => {
    const copy = [...values];
    for (let i = copy.length - 1; i > 0; i--) {
      const j = int(0, i);
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
  };

  const pick = <T,>(values: readonly T[]): T => {
    if (values.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return values[int(0, values.length - 1)];
  };

  const sample = <T,>(values: readonly T[], k: number): T[] => shuffle(values).slice(0, Math.max(0, k));

  return { next, int, pick, sample, shuffle };
}
