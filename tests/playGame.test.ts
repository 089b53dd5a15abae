import { describe, expect, it } from 'vitest';
import { createSeededRandom } from '../src/domain/random.js';
import { playGame, playGameRecord } from '../src/sim/playGame.js';
import { firstRng, lastRng } from './helpers.js';

describe('playGameRecord', () => {
  it('plays a decoy-first game through to a switching win', () => {
    expect(playGameRecord(firstRng)).toEqual({
      game: ['decoy', 'reward', 'decoy'],
      firstPick: 1,
      openedDoor: 3,
      finalPicks: { stay: 1, switch: 2 },
      result: [
        { strategy: 'stay', outcome: 'LOSE' },
        { strategy: 'switch', outcome: 'WIN' },
      ],
    });
  });

  it('plays a reward-first game through to a staying win', () => {
    expect(playGameRecord(lastRng)).toEqual({
      game: ['decoy', 'decoy', 'reward'],
      firstPick: 3,
      openedDoor: 2,
      finalPicks: { stay: 3, switch: 1 },
      result: [
        { strategy: 'stay', outcome: 'WIN' },
        { strategy: 'switch', outcome: 'LOSE' },
      ],
    });
  });

  it('resolves both strategies against the same doors', () => {
    const rng = createSeededRandom(2024);
    for (let i = 0; i < 300; i++) {
      const r = playGameRecord(rng);
      expect(r.finalPicks.stay).toBe(r.firstPick);
      expect(new Set([r.openedDoor, r.finalPicks.stay, r.finalPicks.switch]).size).toBe(3);
      expect(r.game[r.openedDoor - 1]).toBe('decoy');
    }
  });
});

describe('playGame', () => {
  it('returns a stay row then a switch row', () => {
    const [stay, sw] = playGame(createSeededRandom(1));
    expect(stay.strategy).toBe('stay');
    expect(sw.strategy).toBe('switch');
  });

  it('stay wins exactly when switch loses', () => {
    const rng = createSeededRandom(99);
    for (let i = 0; i < 1000; i++) {
      const [stay, sw] = playGame(rng);
      expect(stay.outcome === 'WIN').toBe(sw.outcome === 'LOSE');
    }
  });
});
