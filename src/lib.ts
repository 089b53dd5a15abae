export { ValidationError, LogicError } from './domain/errors.js';
export {
  DOORS,
  DoorContentSchema,
  DoorIndexSchema,
  GameAssignmentSchema,
  type DoorContent,
  type DoorIndex,
  type GameAssignment,
} from './domain/door.js';
export { createSeededRandom, mathRandomSource, shuffle, type RandomSource } from './domain/random.js';
export {
  OUTCOMES,
  STRATEGIES,
  changeDoor,
  createGame,
  determineWinner,
  openGoatDoor,
  selectDoor,
  type Outcome,
  type Strategy,
} from './domain/game.js';
export { playGame, playGameRecord } from './sim/playGame.js';
export {
  formatProportionTable,
  generateGames,
  playNGames,
  tabulateOutcomes,
  toProportionTable,
  type BatchOptions,
} from './sim/batch.js';
export type { BatchResult, GameRecord, GameResult, OutcomeCounts, ProportionTable, StrategyOutcome } from './sim/types.js';
