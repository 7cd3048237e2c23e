import {
  normalizeLevelIndex,
  pickTheme,
  scaleDifficulty,
  type DifficultyParams,
  type EnemyEntityT,
  type GameConfigT,
  type LevelT,
  type PlatformEntityT,
  type PowerUpEntityT,
} from '@lh/level-spec';
import type { Logger } from '@lh/logger';

import {
  createPlatform,
  enemyOnPlatform,
  goalOnPlatform,
  PLAYER_HITBOX,
  platformRight,
  powerUpOnPlatform,
} from '../entity';
import { ConfigurationError } from '../errors';
import { jumpEnvelope } from '../physics/jump';
import { createRandom, type RandomSource } from '../random';
import { pickEnemyVariant, pickPowerUpVariant, rollCoinValue } from '../spawn-table';
import { reachLimit } from './reachability';
import { tutorialLevel } from './tutorial';

export const MIN_GAP = 24;
export const PLAYER_SPAWN_X = 24;

export interface GenerateOptions {
  logger?: Logger;
}

/** Generator-private cursor; never leaves this module. */
interface PlacementConstraint {
  cursorX: number;
  lastTop: number;
  enemyBudget: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function lerp(min: number, max: number, t: number): number {
  return min + (max - min) * clamp(t, 0, 1);
}

function randInt(rng: RandomSource, min: number, max: number): number {
  return Math.floor(lerp(min, max + 1 - 1e-9, rng()));
}

function assertParams(params: DifficultyParams): void {
  const offending: Record<string, number> = {};
  if (!(params.gapRange[1] > 0)) {
    offending.maxGap = params.gapRange[1];
  }
  if (params.reach.length === 0 || !(params.reach[0] > 0)) {
    offending.reach = params.reach[0] ?? 0;
  }
  if (params.platformCount < 3) {
    offending.platformCount = params.platformCount;
  }
  if (Object.keys(offending).length > 0) {
    throw new ConfigurationError('Difficulty parameters leave no reachable platform placement', offending);
  }
}

function placePlatforms(rng: RandomSource, params: DifficultyParams, constraint: PlacementConstraint): PlatformEntityT[] {
  const { world } = params;
  const platforms: PlatformEntityT[] = [
    createPlatform(
      'platform-0',
      { x: 0, y: world.floorTop, width: world.startPlatformWidth, height: world.groundThickness },
      'ground',
    ),
  ];
  constraint.cursorX = world.startPlatformWidth;
  constraint.lastTop = world.floorTop;

  for (let index = 1; index < params.platformCount; index += 1) {
    const width = randInt(rng, params.platformWidth[0], params.platformWidth[1]);
    const step = Math.round(lerp(-params.maxRise, params.maxRise, rng()));
    const top = clamp(constraint.lastTop + step, world.minTop, world.floorTop);

    const rise = Math.max(0, constraint.lastTop - top);
    const upper = Math.max(0, Math.min(params.gapRange[1], reachLimit(params.reach, rise)));
    const lower = Math.min(Math.max(params.gapRange[0], MIN_GAP), upper);
    const gap = clamp(Math.floor(lerp(lower, upper, rng())), lower, upper);

    const platform = createPlatform(`platform-${index}`, {
      x: constraint.cursorX + gap,
      y: top,
      width,
      height: world.platformThickness,
    });
    platforms.push(platform);
    constraint.cursorX = platformRight(platform);
    constraint.lastTop = top;
  }

  return platforms;
}

function placeEnemies(
  rng: RandomSource,
  params: DifficultyParams,
  platforms: PlatformEntityT[],
  constraint: PlacementConstraint,
): { enemies: EnemyEntityT[]; hosts: Set<number> } {
  const enemies: EnemyEntityT[] = [];
  const hosts = new Set<number>();
  // The start and goal platforms stay clear.
  for (let index = 1; index < platforms.length - 1; index += 1) {
    const roll = rng();
    if (constraint.enemyBudget <= 0 || roll >= params.enemyDensity) {
      continue;
    }
    const variant = pickEnemyVariant(params.levelIndex, rng());
    if (!variant) {
      continue;
    }
    enemies.push(enemyOnPlatform(`enemy-${enemies.length}`, variant, platforms[index]));
    hosts.add(index);
    constraint.enemyBudget -= 1;
  }
  return { enemies, hosts };
}

function placePowerUps(
  rng: RandomSource,
  params: DifficultyParams,
  platforms: PlatformEntityT[],
  guarded: Set<number>,
): PowerUpEntityT[] {
  const powerUps: PowerUpEntityT[] = [];
  for (let index = 1; index < platforms.length - 1; index += 1) {
    const chance = guarded.has(index) ? params.powerUpDensity / 2 : params.powerUpDensity;
    if (rng() >= chance) {
      continue;
    }
    const variant = pickPowerUpVariant(params.levelIndex, rng());
    if (!variant) {
      continue;
    }
    const value = variant === 'coin' ? rollCoinValue(rng()) : 1;
    powerUps.push(powerUpOnPlatform(`powerup-${powerUps.length}`, variant, platforms[index], value));
  }
  return powerUps;
}

/**
 * Builds the level for an index and seed. Identical arguments give an
 * identical level; level 1 is the fixed tutorial layout. Parameters are
 * validated for every index, the tutorial included.
 */
export function generateLevel(
  levelIndex: number,
  seed: string | number,
  params: DifficultyParams,
  options: GenerateOptions = {},
): LevelT {
  assertParams(params);
  const index = normalizeLevelIndex(levelIndex);
  if (index === 1) {
    options.logger?.debug({ levelIndex: index, seed }, 'Serving tutorial level');
    return tutorialLevel(seed);
  }

  const rng = createRandom(seed, index);
  const constraint: PlacementConstraint = {
    cursorX: 0,
    lastTop: params.world.floorTop,
    enemyBudget: Math.ceil(params.enemyDensity * (params.platformCount - 2)),
  };

  const platforms = placePlatforms(rng, params, constraint);
  const { enemies, hosts } = placeEnemies(rng, params, platforms, constraint);
  const powerUps = placePowerUps(rng, params, platforms, hosts);
  const theme = pickTheme(rng());

  const goal = goalOnPlatform('goal', platforms[platforms.length - 1]);
  const level: LevelT = {
    index,
    seed: String(seed),
    theme,
    bounds: {
      x: 0,
      y: 0,
      width: constraint.cursorX + params.world.endPadding,
      height: params.world.height,
    },
    start: { x: PLAYER_SPAWN_X, y: params.world.floorTop - PLAYER_HITBOX.height },
    goalPosition: { ...goal.position },
    platforms,
    enemies,
    powerUps,
    goal,
  };

  options.logger?.debug(
    {
      levelIndex: index,
      seed,
      tier: params.tier,
      platforms: platforms.length,
      enemies: enemies.length,
      powerUps: powerUps.length,
      width: level.bounds.width,
    },
    'Generated level',
  );
  return level;
}

/** Derives the jump envelope and difficulty for `levelIndex` from a game config, then generates. */
export function buildLevel(
  levelIndex: number,
  seed: string | number,
  config: GameConfigT,
  options: GenerateOptions = {},
): LevelT {
  const envelope = jumpEnvelope(config.physics);
  const params = scaleDifficulty(levelIndex, config, envelope);
  return generateLevel(levelIndex, seed, params, options);
}
