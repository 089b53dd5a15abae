import type { DoorIndex, GameAssignment } from '../domain/door.js';
import type { Outcome, Strategy } from '../domain/game.js';

export type StrategyOutcome = {
  strategy: Strategy;
  outcome: Outcome;
};

/** One game, both strategies. Always `[stay, switch]`. */
export type GameResult = readonly [StrategyOutcome, StrategyOutcome];

export type GameRecord = {
  game: GameAssignment;
  firstPick: DoorIndex;
  openedDoor: DoorIndex;
  finalPicks: Record<Strategy, DoorIndex>;
  result: GameResult;
};

export type OutcomeCounts = Record<Strategy, Record<Outcome, number>>;

/** Per-strategy share of each outcome, rounded to 2 decimals. */
export type ProportionTable = Record<Strategy, Record<Outcome, number>>;

export type BatchResult = {
  games: number;
  rows: StrategyOutcome[]; // 2 per game, stay then switch
  table: ProportionTable;
};
