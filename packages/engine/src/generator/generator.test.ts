import {
  DEFAULT_GAME_CONFIG,
  Level,
  loadGameConfig,
  scaleDifficulty,
  type LevelT,
} from '@lh/level-spec';
import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../errors';
import { jumpEnvelope } from '../physics/jump';
import { buildLevel, generateLevel } from './generator';
import { verifyLevelChain } from './reachability';
import { levelSignature } from './signature';
import { tutorialLevel } from './tutorial';

const envelope = jumpEnvelope(DEFAULT_GAME_CONFIG.physics);

function platformXY(level: LevelT): Array<[number, number]> {
  return level.platforms.map((platform) => [platform.position.x, platform.position.y]);
}

function hostIndex(level: LevelT, entity: { position: { x: number } }): number {
  return level.platforms.findIndex(
    (platform) =>
      entity.position.x >= platform.position.x &&
      entity.position.x < platform.position.x + platform.size.width,
  );
}

describe('generateLevel', () => {
  it('is deterministic for a level index and seed', () => {
    const params = scaleDifficulty(7, DEFAULT_GAME_CONFIG, envelope);
    const first = generateLevel(7, 'replay', params);
    const second = generateLevel(7, 'replay', params);
    expect(second).toEqual(first);
    expect(levelSignature(second)).toBe(levelSignature(first));
  });

  it('changes the layout with the seed', () => {
    const first = buildLevel(7, 'replay', DEFAULT_GAME_CONFIG);
    const other = buildLevel(7, 'another-seed', DEFAULT_GAME_CONFIG);
    expect(levelSignature(other)).not.toBe(levelSignature(first));
  });

  it('keeps every gap of seed 42 level 5 within 180px and replays it exactly', () => {
    const config = loadGameConfig({ GRAVITY: '0.8', MAX_JUMP_DISTANCE: '180' });
    const level = buildLevel(5, 42, config);
    for (let index = 1; index < level.platforms.length; index += 1) {
      const previous = level.platforms[index - 1];
      const gap = level.platforms[index].position.x - (previous.position.x + previous.size.width);
      expect(gap).toBeGreaterThanOrEqual(0);
      expect(gap).toBeLessThanOrEqual(180);
    }
    expect(platformXY(buildLevel(5, 42, config))).toEqual(platformXY(level));
  });

  it('keeps every consecutive platform pair reachable', () => {
    for (const seed of ['alpha', 7]) {
      for (let levelIndex = 2; levelIndex <= 60; levelIndex += 1) {
        const params = scaleDifficulty(levelIndex, DEFAULT_GAME_CONFIG, envelope);
        const level = generateLevel(levelIndex, seed, params);
        expect(verifyLevelChain(level, envelope)).toEqual([]);
        for (let index = 1; index < level.platforms.length; index += 1) {
          const rise = level.platforms[index - 1].position.y - level.platforms[index].position.y;
          expect(Math.abs(rise)).toBeLessThanOrEqual(params.maxRise);
        }
      }
    }
  });

  it('places integer platforms inside the vertical band', () => {
    const { world } = DEFAULT_GAME_CONFIG;
    const level = buildLevel(24, 'band', DEFAULT_GAME_CONFIG);
    for (const platform of level.platforms) {
      expect(Number.isInteger(platform.position.x)).toBe(true);
      expect(Number.isInteger(platform.position.y)).toBe(true);
      expect(platform.position.y).toBeGreaterThanOrEqual(world.minTop);
      expect(platform.position.y).toBeLessThanOrEqual(world.floorTop);
    }
    expect(level.platforms).toHaveLength(14);
    expect(level.bounds.width).toBe(
      level.platforms[13].position.x + level.platforms[13].size.width + world.endPadding,
    );
  });

  it('keeps the start and goal platforms clear', () => {
    for (let levelIndex = 2; levelIndex <= 40; levelIndex += 1) {
      const level = buildLevel(levelIndex, 'clear', DEFAULT_GAME_CONFIG);
      const last = level.platforms.length - 1;
      for (const entity of [...level.enemies, ...level.powerUps]) {
        const host = hostIndex(level, entity);
        expect(host).toBeGreaterThan(0);
        expect(host).toBeLessThan(last);
      }
      expect(hostIndex(level, level.goal)).toBe(last);
      expect(level.goal.position.y + level.goal.size.height).toBe(level.platforms[last].position.y);
      expect(level.goalPosition).toEqual(level.goal.position);
    }
  });

  it('only spawns variants unlocked for the level', () => {
    for (const seed of ['a', 'b', 'c', 'd']) {
      const level = buildLevel(3, seed, DEFAULT_GAME_CONFIG);
      for (const enemy of level.enemies) {
        expect(['chaser', 'patrol']).toContain(enemy.variant);
      }
    }
  });

  it('produces levels that satisfy the level schema', () => {
    const level = buildLevel(12, 'schema', DEFAULT_GAME_CONFIG);
    expect(Level.safeParse(level).success).toBe(true);
    expect(level.seed).toBe('schema');
    expect(level.start).toEqual({ x: 24, y: 520 });
  });

  it('serves the tutorial layout for level 1', () => {
    const level = buildLevel(1, 'anything', DEFAULT_GAME_CONFIG);
    expect(level).toEqual(tutorialLevel('anything'));
    expect(level.theme).toBe('dawn');
    expect(verifyLevelChain(level, envelope)).toEqual([]);
  });

  it('refuses degenerate configuration', () => {
    const config = loadGameConfig({ MAX_JUMP_DISTANCE: '0' });
    expect(() => buildLevel(3, 'broken', config)).toThrow(ConfigurationError);

    const params = scaleDifficulty(3, DEFAULT_GAME_CONFIG, envelope);
    expect(() => generateLevel(3, 'broken', { ...params, gapRange: [0, 0] })).toThrow(ConfigurationError);
  });

  it('refuses degenerate parameters for the tutorial index too', () => {
    const params = scaleDifficulty(1, DEFAULT_GAME_CONFIG, envelope);
    expect(() => generateLevel(1, 'broken', { ...params, reach: [] })).toThrow(ConfigurationError);
    expect(() => generateLevel(1, 'broken', { ...params, platformCount: 2 })).toThrow(ConfigurationError);
    expect(generateLevel(1, 'fine', params)).toEqual(tutorialLevel('fine'));
  });
});
