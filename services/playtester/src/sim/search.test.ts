import { buildLevel, createPlayer, jumpEnvelope, verifyLevelChain } from '@lh/engine';
import { DEFAULT_GAME_CONFIG } from '@lh/level-spec';
import { describe, expect, it } from 'vitest';

import { chasmLevel, flatLevel, ledgeLevel } from '../../test/fixtures';
import { advanceFrontier, replayPath, searchLevel, TICKS_PER_ACTION } from './search';

const physics = DEFAULT_GAME_CONFIG.physics;

describe('sim/search', () => {
  it('walks to a goal on flat ground', () => {
    const level = flatLevel();
    const result = searchLevel(level, { physics, timeLimitMs: 15000, maxNodes: 50000 });
    expect(result.ok).toBe(true);
    expect(result.actions?.length ?? 0).toBeGreaterThan(0);
    expect(result.path).toHaveLength((result.actions?.length ?? 0) * TICKS_PER_ACTION);
    expect(replayPath(level, result.path ?? [], physics)).toBe(true);
  });

  it('jumps up onto a ledge within reach', { timeout: 20000 }, () => {
    const level = ledgeLevel();
    const result = searchLevel(level, { physics, timeLimitMs: 15000, maxNodes: 100000 });
    expect(result.ok).toBe(true);
    expect(result.actions).toEqual(expect.arrayContaining([expect.stringMatching(/jump/)]));
    expect(replayPath(level, result.path ?? [], physics)).toBe(true);
  });

  it('gives up on a chasm wider than any jump', () => {
    const result = searchLevel(chasmLevel(), { physics, timeLimitMs: 15000, maxNodes: 5000 });
    expect(result.ok).toBe(false);
    expect(['no_path', 'node_limit']).toContain(result.reason);
    expect(result.path).toBeUndefined();
  });

  it('does not count standing still as reaching the goal', () => {
    expect(replayPath(flatLevel(), [], physics)).toBe(false);
  });

  it('only moves the backtrack frontier from solid footing', () => {
    const airborne = { ...createPlayer({ x: 900, y: 400 }), grounded: false };
    const standing = { ...createPlayer({ x: 320, y: 520 }), grounded: true };
    expect(advanceFrontier(100, airborne)).toBe(100);
    expect(advanceFrontier(100, standing)).toBe(320);
    expect(advanceFrontier(500, standing)).toBe(500);
  });

  it.each([
    [1, 'alpha'],
    [2, 'alpha'],
    [3, 'beta'],
  ])('finds a route through generated level %i (seed %s)', (levelIndex, seed) => {
    const level = buildLevel(levelIndex, seed, DEFAULT_GAME_CONFIG);
    expect(verifyLevelChain(level, jumpEnvelope(physics))).toEqual([]);

    const result = searchLevel(level, { physics, timeLimitMs: 60000, maxNodes: 400000 });
    expect(result.reason).toBeUndefined();
    expect(result.ok).toBe(true);
    expect(replayPath(level, result.path ?? [], physics)).toBe(true);
  }, 90000);
});
