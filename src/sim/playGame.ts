import { changeDoor, createGame, determineWinner, openGoatDoor, selectDoor } from '../domain/game.js';
import { mathRandomSource, type RandomSource } from '../domain/random.js';
import type { GameRecord, GameResult } from './types.js';

/**
 * Plays one game and keeps every intermediate door. Both strategies are
 * resolved against the same game, first pick and opened door.
 */
export function playGameRecord(rng: RandomSource = mathRandomSource): GameRecord {
  const game = createGame(rng);
  const firstPick = selectDoor(rng);
  const openedDoor = openGoatDoor(game, firstPick, rng);

  const stayPick = changeDoor(true, openedDoor, firstPick);
  const switchPick = changeDoor(false, openedDoor, firstPick);

  return {
    game,
    firstPick,
    openedDoor,
    finalPicks: { stay: stayPick, switch: switchPick },
    result: [
      { strategy: 'stay', outcome: determineWinner(stayPick, game) },
      { strategy: 'switch', outcome: determineWinner(switchPick, game) },
    ],
  };
}

export function playGame(rng: RandomSource = mathRandomSource): GameResult {
  return playGameRecord(rng).result;
}
