import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import { OUTCOMES, STRATEGIES } from '../domain/game.js';
import { mathRandomSource, type RandomSource } from '../domain/random.js';
import { logger } from '../utils/logger.js';
import { playGameRecord } from './playGame.js';
import type { BatchResult, GameRecord, OutcomeCounts, ProportionTable, StrategyOutcome } from './types.js';

const GameCountSchema = z.number().int().positive();

export type BatchOptions = {
  rng?: RandomSource;
  /** Where the proportion table goes. Defaults to stdout. */
  print?: (text: string) => void;
};

function printToStdout(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}

export function parseGameCount(n: unknown): number {
  const parsed = GameCountSchema.safeParse(n);
  if (!parsed.success) throw ValidationError.fromZod(`Invalid game count: ${String(n)}`, parsed.error);
  return parsed.data;
}

/** Lazily plays `n` independent games. */
export function* generateGames(n: number, rng: RandomSource = mathRandomSource): Generator<GameRecord, void, undefined> {
  const count = parseGameCount(n);
  for (let i = 0; i < count; i++) {
    yield playGameRecord(rng);
  }
}

function emptyCounts(): OutcomeCounts {
  return {
    stay: { WIN: 0, LOSE: 0 },
    switch: { WIN: 0, LOSE: 0 },
  };
}

export function tabulateOutcomes(rows: Iterable<StrategyOutcome>): OutcomeCounts {
  const counts = emptyCounts();
  for (const row of rows) {
    counts[row.strategy][row.outcome] += 1;
  }
  return counts;
}

// Half to even, so a row that splits on an exact half (1/8 vs 7/8) still sums to 1.
export function round2(x: number): number {
  const scaled = x * 100;
  const lower = Math.floor(scaled);
  if (Math.abs(scaled - lower - 0.5) < 1e-9) {
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

/** Row-normalises counts so each strategy's outcomes sum to 1, then rounds. */
export function toProportionTable(counts: OutcomeCounts): ProportionTable {
  const table = emptyCounts();
  for (const strategy of STRATEGIES) {
    const row = counts[strategy];
    const total = row.WIN + row.LOSE;
    if (total <= 0) throw new ValidationError(`No games recorded for strategy ${strategy}`);
    table[strategy] = { WIN: round2(row.WIN / total), LOSE: round2(row.LOSE / total) };
  }
  return table;
}

export function formatProportionTable(table: ProportionTable): string {
  const rowHeader = 'strategy';
  const labelWidth = rowHeader.length;
  const widths = OUTCOMES.map(o => Math.max(o.length, ...STRATEGIES.map(s => table[s][o].toFixed(2).length)));

  const lines: string[] = [];
  lines.push(`${' '.repeat(labelWidth + 1)}outcome`);
  lines.push([rowHeader, ...OUTCOMES.map((o, i) => o.padStart(widths[i]))].join(' '));
  for (const s of STRATEGIES) {
    const cells = OUTCOMES.map((o, i) => table[s][o].toFixed(2).padStart(widths[i]));
    lines.push([`  ${s}`.padEnd(labelWidth), ...cells].join(' '));
  }
  return lines.join('\n');
}

/**
 * Plays `n` games, prints the per-strategy outcome proportions and returns
 * every row alongside the table.
 */
export function playNGames(n: number = 100, options: BatchOptions = {}): BatchResult {
  const games = parseGameCount(n);
  const rng = options.rng ?? mathRandomSource;
  const print = options.print ?? printToStdout;

  const rows: StrategyOutcome[] = [];
  let played = 0;
  for (const record of generateGames(games, rng)) {
    played++;
    rows.push(...record.result);
    logger.debug('game_played', {
      game: played,
      doors: record.game.join(','),
      firstPick: record.firstPick,
      openedDoor: record.openedDoor,
      stay: record.result[0].outcome,
      switch: record.result[1].outcome,
    });
  }

  const table = toProportionTable(tabulateOutcomes(rows));
  print(formatProportionTable(table));

  logger.info('batch_complete', {
    games,
    stayWinRate: table.stay.WIN,
    switchWinRate: table.switch.WIN,
  });

  return { games, rows, table };
}
