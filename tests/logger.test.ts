import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatLine, logger } from '../src/utils/logger.js';
import { firstRng } from './helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  vi.resetModules();
});

describe('formatLine', () => {
  const at = new Date('2024-03-01T12:00:00.000Z');

  it('prefixes time and level', () => {
    expect(formatLine('info', 'batch_complete', undefined, at)).toBe('[montyhall] 2024-03-01T12:00:00.000Z INFO batch_complete');
  });

  it('appends meta as json', () => {
    expect(formatLine('warn', 'seeded_run', { seed: 4 }, at)).toBe(
      '[montyhall] 2024-03-01T12:00:00.000Z WARN seeded_run {"seed":4}'
    );
  });

  it('skips empty meta', () => {
    expect(formatLine('error', 'cli_failed', {}, at)).toBe('[montyhall] 2024-03-01T12:00:00.000Z ERROR cli_failed');
  });
});

describe('logger', () => {
  it('routes errors to stderr', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.error('cli_failed', { err: 'boom' });
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0]?.[0]).toMatch(/ ERROR cli_failed \{"err":"boom"\}$/);
  });

  it('drops debug lines when MONTY_DEBUG is off', async () => {
    vi.stubEnv('MONTY_DEBUG', '0');
    vi.resetModules();
    const fresh = await import('../src/utils/logger.js');
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    fresh.logger.debug('game_played', { game: 1 });
    expect(out).not.toHaveBeenCalled();
  });

  it('writes debug lines when MONTY_DEBUG is on', async () => {
    vi.stubEnv('MONTY_DEBUG', '1');
    vi.resetModules();
    const fresh = await import('../src/utils/logger.js');
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    fresh.logger.debug('game_played', { game: 1 });
    expect(out).toHaveBeenCalledTimes(1);
    expect(out.mock.calls[0]?.[0]).toMatch(/ DEBUG game_played \{"game":1\}$/);
  });

  it('logs every game of a batch in debug mode', async () => {
    vi.stubEnv('MONTY_DEBUG', 'yes');
    vi.resetModules();
    const { playNGames } = await import('../src/sim/batch.js');
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    playNGames(1, { rng: firstRng, print: () => {} });
    const debugLines = out.mock.calls.map(call => String(call[0])).filter(line => line.includes(' DEBUG '));
    expect(debugLines).toHaveLength(1);
    expect(debugLines[0]).toMatch(
      / DEBUG game_played \{"game":1,"doors":"decoy,reward,decoy","firstPick":1,"openedDoor":3,"stay":"LOSE","switch":"WIN"\}$/
    );
  });
});
