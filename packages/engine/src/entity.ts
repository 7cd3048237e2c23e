import type {
  EnemyEntityT,
  EnemyVariant,
  GoalEntityT,
  HitboxT,
  PlatformEntityT,
  PlayerEntityT,
  PowerUpEntityT,
  PowerUpVariant,
  Vec2T,
} from '@lh/level-spec';

import { EntityShapeError } from './errors';
import { ENEMY_SPAWNS, POWER_UP_SPAWNS, type EntitySize } from './spawn-table';

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const PLAYER_ID = 'player';
export const PLAYER_SIZE: EntitySize = { width: 32, height: 40 };
export const PLAYER_HITBOX: HitboxT = { offsetX: 6, offsetY: 0, width: 20, height: 40 };
export const GOAL_SIZE: EntitySize = { width: 32, height: 48 };

const ZERO: Vec2T = { x: 0, y: 0 };

interface Placed {
  position: Vec2T;
  hitbox: HitboxT;
}

export function hitboxAt(entity: Placed, position: Vec2T = entity.position): Box {
  return {
    x: position.x + entity.hitbox.offsetX,
    y: position.y + entity.hitbox.offsetY,
    width: entity.hitbox.width,
    height: entity.hitbox.height,
  };
}

export function boxesOverlap(a: Box, b: Box): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

export function unionBox(a: Box, b: Box): Box {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(a.x + a.width, b.x + b.width) - x,
    height: Math.max(a.y + a.height, b.y + b.height) - y,
  };
}

export function assertHitboxInside(id: string, size: EntitySize, hitbox: HitboxT): void {
  const inside =
    hitbox.offsetX >= 0 &&
    hitbox.offsetY >= 0 &&
    hitbox.width > 0 &&
    hitbox.height > 0 &&
    hitbox.offsetX + hitbox.width <= size.width &&
    hitbox.offsetY + hitbox.height <= size.height;
  if (!inside) {
    throw new EntityShapeError(
      `Hitbox of ${id} leaves its ${size.width}x${size.height} render bounds`,
      id,
    );
  }
}

export function createPlayer(position: Vec2T): PlayerEntityT {
  assertHitboxInside(PLAYER_ID, PLAYER_SIZE, PLAYER_HITBOX);
  return {
    kind: 'player',
    id: PLAYER_ID,
    position: { ...position },
    size: { ...PLAYER_SIZE },
    velocity: { ...ZERO },
    acceleration: { ...ZERO },
    hitbox: { ...PLAYER_HITBOX },
    grounded: false,
  };
}

/** Platforms collide with their full render bounds. */
export function createPlatform(
  id: string,
  box: Box,
  variant: PlatformEntityT['variant'] = 'ledge',
): PlatformEntityT {
  const hitbox: HitboxT = { offsetX: 0, offsetY: 0, width: box.width, height: box.height };
  assertHitboxInside(id, box, hitbox);
  return {
    kind: 'platform',
    variant,
    id,
    position: { x: box.x, y: box.y },
    size: { width: box.width, height: box.height },
    velocity: { ...ZERO },
    acceleration: { ...ZERO },
    hitbox,
    grounded: false,
  };
}

export interface EnemyOptions {
  direction?: 1 | -1;
  velocity?: Vec2T;
  interval?: number;
  ttl?: number | null;
}

export function createEnemy(
  id: string,
  variant: EnemyVariant,
  position: Vec2T,
  options: EnemyOptions = {},
): EnemyEntityT {
  const spawn = ENEMY_SPAWNS[variant];
  assertHitboxInside(id, spawn.size, spawn.hitbox);
  return {
    kind: 'enemy',
    variant,
    id,
    position: { ...position },
    size: { ...spawn.size },
    velocity: { ...(options.velocity ?? ZERO) },
    acceleration: { ...ZERO },
    hitbox: { ...spawn.hitbox },
    grounded: false,
    brain: {
      direction: options.direction ?? -1,
      anchorX: position.x,
      timer: 0,
      interval: options.interval ?? 0,
      ttl: options.ttl ?? null,
    },
  };
}

/** Places an enemy so that it stands centred on a platform top. */
export function enemyOnPlatform(id: string, variant: EnemyVariant, platform: PlatformEntityT): EnemyEntityT {
  const size = ENEMY_SPAWNS[variant].size;
  return createEnemy(id, variant, {
    x: Math.round(platform.position.x + platform.size.width / 2 - size.width / 2),
    y: platform.position.y - size.height,
  });
}

export function createPowerUp(
  id: string,
  variant: PowerUpVariant,
  position: Vec2T,
  value = 1,
): PowerUpEntityT {
  const spawn = POWER_UP_SPAWNS[variant];
  assertHitboxInside(id, spawn.size, spawn.hitbox);
  return {
    kind: 'powerUp',
    variant,
    id,
    position: { ...position },
    size: { ...spawn.size },
    velocity: { ...ZERO },
    acceleration: { ...ZERO },
    hitbox: { ...spawn.hitbox },
    grounded: false,
    value,
  };
}

/** Power-ups hover 8px above the platform they belong to. */
export function powerUpOnPlatform(
  id: string,
  variant: PowerUpVariant,
  platform: PlatformEntityT,
  value = 1,
): PowerUpEntityT {
  const size = POWER_UP_SPAWNS[variant].size;
  return createPowerUp(
    id,
    variant,
    {
      x: Math.round(platform.position.x + platform.size.width / 2 - size.width / 2),
      y: platform.position.y - size.height - 8,
    },
    value,
  );
}

export function goalOnPlatform(id: string, platform: PlatformEntityT): GoalEntityT {
  const hitbox: HitboxT = { offsetX: 0, offsetY: 0, width: GOAL_SIZE.width, height: GOAL_SIZE.height };
  assertHitboxInside(id, GOAL_SIZE, hitbox);
  return {
    kind: 'goal',
    id,
    position: {
      x: Math.round(platform.position.x + platform.size.width / 2 - GOAL_SIZE.width / 2),
      y: platform.position.y - GOAL_SIZE.height,
    },
    size: { ...GOAL_SIZE },
    velocity: { ...ZERO },
    acceleration: { ...ZERO },
    hitbox,
    grounded: true,
  };
}

export function platformTop(platform: PlatformEntityT): number {
  return platform.position.y;
}

export function platformRight(platform: PlatformEntityT): number {
  return platform.position.x + platform.size.width;
}
