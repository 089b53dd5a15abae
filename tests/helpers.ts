import type { RandomSource } from '../src/domain/random.js';

/** Always takes the first candidate. */
export const firstRng: RandomSource = {
  pick: items => items[0],
};

/** Always takes the last candidate. */
export const lastRng: RandomSource = {
  pick: items => items[items.length - 1],
};
