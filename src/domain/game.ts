import { contentAt, DOORS, parseDoor, parseGame, type DoorContent, type DoorIndex, type GameAssignment } from './door.js';
import { LogicError } from './errors.js';
import { mathRandomSource, shuffle, type RandomSource } from './random.js';

export type Strategy = 'stay' | 'switch';
export type Outcome = 'WIN' | 'LOSE';

export const STRATEGIES: readonly Strategy[] = ['stay', 'switch'];
// Alphabetical, the order a contingency table lists string levels in.
export const OUTCOMES: readonly Outcome[] = ['LOSE', 'WIN'];

const PRIZES: readonly DoorContent[] = ['decoy', 'decoy', 'reward'];

/** Hides one reward and two decoys behind the doors, uniformly at random. */
export function createGame(rng: RandomSource = mathRandomSource): GameAssignment {
  const [first, second, third] = shuffle(PRIZES, rng);
  return [first, second, third];
}

/** The contestant's first pick. Knows nothing about the game. */
export function selectDoor(rng: RandomSource = mathRandomSource): DoorIndex {
  return rng.pick(DOORS);
}

/**
 * The host opens a door that is neither the reward nor the contestant's pick.
 *
 * With the reward picked, either decoy will do and the host draws one at random.
 * With a decoy picked, only one door qualifies and no randomness is used.
 */
export function openGoatDoor(game: GameAssignment, pick: DoorIndex, rng: RandomSource = mathRandomSource): DoorIndex {
  const g = parseGame(game);
  const p = parseDoor(pick, 'pick');

  const candidates = DOORS.filter(d => d !== p && contentAt(g, d) === 'decoy');
  if (contentAt(g, p) === 'reward') {
    if (candidates.length !== 2) throw new LogicError(`Expected two decoys beside the reward, found ${candidates.length}`);
    return rng.pick(candidates);
  }

  if (candidates.length !== 1) {
    throw new LogicError(`Expected exactly one other decoy for pick ${p}, found ${candidates.length}`);
  }
  return candidates[0];
}

/**
 * Final door for a contestant who stays on `pick` or switches away from it.
 * Switching lands on the one door that is neither opened nor picked.
 */
export function changeDoor(stay: boolean, openedDoor: DoorIndex, pick: DoorIndex): DoorIndex {
  const opened = parseDoor(openedDoor, 'opened door');
  const p = parseDoor(pick, 'pick');
  if (stay) return p;

  const remaining = DOORS.filter(d => d !== opened && d !== p);
  if (remaining.length !== 1) {
    throw new LogicError(`No single door left to switch to (opened=${opened}, pick=${p})`);
  }
  return remaining[0];
}

export function determineWinner(finalPick: DoorIndex, game: GameAssignment): Outcome {
  const d = parseDoor(finalPick, 'final pick');
  return contentAt(parseGame(game), d) === 'reward' ? 'WIN' : 'LOSE';
}
