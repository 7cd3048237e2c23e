import { buildLevel, levelSignature } from '@lh/engine';
import { DEFAULT_GAME_CONFIG } from '@lh/level-spec';
import { makeLogger } from '@lh/logger';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { runPlaytest } from '../src/playtest';
import { chasmLevel, flatLevel } from './fixtures';

const logger = makeLogger('playtest-spec');
const config = DEFAULT_GAME_CONFIG;

describe('runPlaytest', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('reports every generated level in the range', async () => {
    const report = await runPlaytest({ from: 1, to: 4, seed: 'report', config, logger, search: null });

    expect(report.completed).toBe(true);
    expect(report.failures).toBe(0);
    expect(report.levels.map((level) => level.levelIndex)).toEqual([1, 2, 3, 4]);
    expect(report.levels[0].theme).toBe('dawn');
    expect(report.levels[0].signature).toBe(levelSignature(buildLevel(1, 'report', config)));
    expect(report.levels.every((level) => level.violations.length === 0 && level.search === null)).toBe(true);
    expect(logger.info).toHaveBeenCalledTimes(4);
  });

  it('searches each level when asked', async () => {
    const report = await runPlaytest({
      from: 2,
      to: 2,
      seed: 'search',
      config,
      logger,
      search: { timeLimitMs: 15000, maxNodes: 50000 },
      buildLevel: (levelIndex) => flatLevel(levelIndex),
    });
    expect(report.levels[0].ok).toBe(true);
    expect(report.levels[0].search?.ok).toBe(true);
    expect(report.levels[0].search?.actions ?? 0).toBeGreaterThan(0);
  });

  it('counts levels whose goal cannot be reached', async () => {
    const report = await runPlaytest({
      from: 2,
      to: 2,
      seed: 'search',
      config,
      logger,
      search: { timeLimitMs: 15000, maxNodes: 2000 },
      buildLevel: (levelIndex) => chasmLevel(levelIndex),
    });
    expect(report.failures).toBe(1);
    expect(report.levels[0].violations.map((violation) => violation.reason)).toEqual(['gap_too_wide']);
    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ levelIndex: 2 }), 'Level failed playtest');
  });

  it('stops early once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const report = await runPlaytest({
      from: 1,
      to: 10,
      seed: 'abort',
      config,
      logger,
      signal: controller.signal,
    });
    expect(report.completed).toBe(false);
    expect(report.levels).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith({ levelIndex: 1 }, 'Playtest aborted before finishing the range');
  });
});
