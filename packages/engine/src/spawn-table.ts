import {
  ENEMY_VARIANTS,
  POWER_UP_VARIANTS,
  type EnemyVariant,
  type HitboxT,
  type PowerUpVariant,
} from '@lh/level-spec';

export interface EntitySize {
  width: number;
  height: number;
}

export interface EnemySpawn {
  size: EntitySize;
  hitbox: HitboxT;
  weight: number;
  minLevel: number;
  /** Horizontal speed limit in px/frame. */
  speed: number;
  spawnable: boolean;
  gravityScale: number;
  frictionScale: number;
  collidesWithPlatforms: boolean;
}

export interface PowerUpSpawn {
  size: EntitySize;
  hitbox: HitboxT;
  weight: number;
  minLevel: number;
  durationFrames: number | null;
}

const POWER_UP_SIZE: EntitySize = { width: 20, height: 20 };
const POWER_UP_HITBOX: HitboxT = { offsetX: 2, offsetY: 2, width: 16, height: 16 };

export const ENEMY_SPAWNS: Readonly<Record<EnemyVariant, EnemySpawn>> = {
  chaser: {
    size: { width: 32, height: 32 },
    hitbox: { offsetX: 2, offsetY: 2, width: 28, height: 30 },
    weight: 4,
    minLevel: 1,
    speed: 1.4,
    spawnable: true,
    gravityScale: 1,
    frictionScale: 1,
    collidesWithPlatforms: true,
  },
  patrol: {
    size: { width: 40, height: 40 },
    hitbox: { offsetX: 4, offsetY: 4, width: 32, height: 36 },
    weight: 4,
    minLevel: 2,
    speed: 0.8,
    spawnable: true,
    gravityScale: 1,
    frictionScale: 1,
    collidesWithPlatforms: true,
  },
  jumper: {
    size: { width: 35, height: 35 },
    hitbox: { offsetX: 3, offsetY: 3, width: 29, height: 32 },
    weight: 3,
    minLevel: 4,
    speed: 1,
    spawnable: true,
    gravityScale: 1,
    frictionScale: 1,
    collidesWithPlatforms: true,
  },
  shooter: {
    size: { width: 45, height: 45 },
    hitbox: { offsetX: 4, offsetY: 5, width: 37, height: 40 },
    weight: 2,
    minLevel: 6,
    speed: 0,
    spawnable: true,
    gravityScale: 1,
    frictionScale: 1,
    collidesWithPlatforms: true,
  },
  projectile: {
    size: { width: 8, height: 8 },
    hitbox: { offsetX: 0, offsetY: 0, width: 8, height: 8 },
    weight: 0,
    minLevel: 6,
    speed: 3,
    spawnable: false,
    gravityScale: 0,
    frictionScale: 0,
    collidesWithPlatforms: false,
  },
};

export const POWER_UP_SPAWNS: Readonly<Record<PowerUpVariant, PowerUpSpawn>> = {
  speedBoost: { size: POWER_UP_SIZE, hitbox: POWER_UP_HITBOX, weight: 15, minLevel: 1, durationFrames: 300 },
  jumpBoost: { size: POWER_UP_SIZE, hitbox: POWER_UP_HITBOX, weight: 15, minLevel: 1, durationFrames: 300 },
  shield: { size: POWER_UP_SIZE, hitbox: POWER_UP_HITBOX, weight: 8, minLevel: 1, durationFrames: 1800 },
  doubleJump: { size: POWER_UP_SIZE, hitbox: POWER_UP_HITBOX, weight: 12, minLevel: 1, durationFrames: 240 },
  health: { size: POWER_UP_SIZE, hitbox: POWER_UP_HITBOX, weight: 10, minLevel: 1, durationFrames: null },
  coin: { size: POWER_UP_SIZE, hitbox: POWER_UP_HITBOX, weight: 30, minLevel: 1, durationFrames: null },
};

interface WeightedEntry {
  weight: number;
  minLevel: number;
}

function pickWeighted<V extends string>(
  variants: readonly V[],
  table: Readonly<Record<V, WeightedEntry>>,
  levelIndex: number,
  roll: number,
): V | null {
  const eligible = variants.filter((variant) => {
    const entry = table[variant];
    return entry.weight > 0 && entry.minLevel <= levelIndex;
  });
  const total = eligible.reduce((sum, variant) => sum + table[variant].weight, 0);
  if (total <= 0) {
    return null;
  }

  let remaining = Math.min(Math.max(roll, 0), 0.999999) * total;
  for (const variant of eligible) {
    remaining -= table[variant].weight;
    if (remaining < 0) {
      return variant;
    }
  }
  return eligible[eligible.length - 1];
}

export function pickEnemyVariant(levelIndex: number, roll: number): EnemyVariant | null {
  const spawnable = ENEMY_VARIANTS.filter((variant) => ENEMY_SPAWNS[variant].spawnable);
  return pickWeighted(spawnable, ENEMY_SPAWNS, levelIndex, roll);
}

export function pickPowerUpVariant(levelIndex: number, roll: number): PowerUpVariant | null {
  return pickWeighted(POWER_UP_VARIANTS, POWER_UP_SPAWNS, levelIndex, roll);
}

/** 1 is common, 2 comes up 20% of the time and 3 only 5%. */
export function rollCoinValue(roll: number): number {
  if (roll < 0.05) {
    return 3;
  }
  if (roll < 0.25) {
    return 2;
  }
  return 1;
}
