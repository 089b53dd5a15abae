import { LogicError, ValidationError } from './errors.js';

/**
 * Source of uniform draws. Everything that needs chance takes one of these,
 * so a run can be replayed by handing in a seeded source.
 */
export interface RandomSource {
  pick<T>(items: readonly T[]): T;
}

function pickWith<T>(next: () => number, items: readonly T[]): T {
  if (items.length === 0) throw new LogicError('Cannot pick from an empty set');
  const idx = Math.min(items.length - 1, Math.floor(next() * items.length));
  return items[idx];
}

export const mathRandomSource: RandomSource = {
  pick: items => pickWith(Math.random, items),
};

/**
 * xorshift32. Not for anything that needs real unpredictability.
 */
export function createSeededRandom(seed: number): RandomSource {
  if (!Number.isFinite(seed) || !Number.isInteger(seed)) {
    throw new ValidationError(`Invalid seed (expected an integer): ${seed}`);
  }
  let state = seed >>> 0 || 0x9e3779b9;

  const next = (): number => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state / 0x100000000;
  };

  return {
    pick: items => pickWith(next, items),
  };
}

/** Fisher-Yates over a copy. */
export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = rng.pick(Array.from({ length: i + 1 }, (_, k) => k));
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}
