import { config as defaultConfig, type Config } from './config/index.js';
import { createSeededRandom, mathRandomSource, type RandomSource } from './domain/random.js';
import { playNGames, type BatchOptions } from './sim/batch.js';
import { logger } from './utils/logger.js';

/** First positional argument wins over `MONTY_GAMES`. */
export function resolveGameCount(argv: readonly string[], cfg: Pick<Config, 'games'>): number {
  const arg = argv[2];
  return arg === undefined ? cfg.games : Number(arg);
}

export function resolveRandomSource(seed: number | undefined): RandomSource {
  if (seed === undefined) return mathRandomSource;
  logger.info('seeded_run', { seed });
  return createSeededRandom(seed);
}

/**
 * Runs one batch from the command line. Returns the process exit code
 * instead of setting it, so callers decide how to exit.
 */
export function runCli(argv: readonly string[], cfg: Config = defaultConfig, print?: BatchOptions['print']): number {
  try {
    const n = resolveGameCount(argv, cfg);
    playNGames(n, { rng: resolveRandomSource(cfg.seed), print });
    return 0;
  } catch (err) {
    logger.error('cli_failed', { err: String(err) });
    return 1;
  }
}
