import * as dotenv from 'dotenv';

dotenv.config();

function flag(v: string | undefined): boolean {
  return v === '1' || v === 'true' || v === 'yes';
}

function optionalNumber(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  return Number(v);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    // Games played by the CLI when no count is passed on the command line.
    games: Number(env.MONTY_GAMES || 100),

    /** Fixed seed for reproducible runs. Unset => Math.random. */
    seed: optionalNumber(env.MONTY_SEED),

    // Per-game debug lines (can be noisy for large batches)
    debug: flag(env.MONTY_DEBUG),
  };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
