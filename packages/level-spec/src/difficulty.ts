import type { DifficultyTierT, GameConfigT, WorldConfigT } from './config';

/** Jump reach derived from the physics constants. */
export interface JumpEnvelope {
  maxHeight: number;
  maxDistance: number;
  airFrames: number;
  /** `reach[r]` is the horizontal distance covered by a jump that lands `r` px higher than it started. */
  reach: number[];
}

export type DifficultyParams = {
  levelIndex: number;
  tier: DifficultyTierT['name'];
  tierIndex: number;
  platformCount: number;
  platformWidth: [number, number];
  gapRange: [number, number];
  maxRise: number;
  enemyDensity: number;
  powerUpDensity: number;
  reach: number[];
  world: WorldConfigT;
};

export function normalizeLevelIndex(levelIndex: number): number {
  if (!Number.isFinite(levelIndex)) {
    return 1;
  }
  return Math.max(1, Math.round(levelIndex));
}

export function tierForLevel(
  levelIndex: number,
  tiers: DifficultyTierT[],
): { tier: DifficultyTierT; tierIndex: number } {
  const normalized = normalizeLevelIndex(levelIndex);
  let tierIndex = 0;
  for (let index = 0; index < tiers.length; index += 1) {
    if (tiers[index].fromLevel <= normalized) {
      tierIndex = index;
    }
  }
  return { tier: tiers[tierIndex], tierIndex };
}

/**
 * Maps a level index onto generator parameters. Indices past the last tier
 * reuse it, so the bounds stop growing there.
 */
export function scaleDifficulty(
  levelIndex: number,
  config: Pick<GameConfigT, 'tiers' | 'world'>,
  envelope: JumpEnvelope,
): DifficultyParams {
  const normalized = normalizeLevelIndex(levelIndex);
  const { tier, tierIndex } = tierForLevel(normalized, config.tiers);

  const gapMin = Math.floor(tier.gapFraction[0] * envelope.maxDistance);
  const gapMax = Math.floor(tier.gapFraction[1] * envelope.maxDistance);

  return {
    levelIndex: normalized,
    tier: tier.name,
    tierIndex,
    platformCount: tier.platformCount,
    platformWidth: [tier.platformWidth[0], tier.platformWidth[1]],
    gapRange: [gapMin, gapMax],
    maxRise: Math.floor(tier.riseFraction * envelope.maxHeight),
    enemyDensity: tier.enemyDensity,
    powerUpDensity: tier.powerUpDensity,
    reach: [...envelope.reach],
    world: { ...config.world },
  };
}
