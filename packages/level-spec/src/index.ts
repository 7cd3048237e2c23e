import { z } from 'zod';

import { THEME_NAMES } from './themes';

export const ENEMY_VARIANTS = ['chaser', 'patrol', 'jumper', 'shooter', 'projectile'] as const;
export const POWER_UP_VARIANTS = ['speedBoost', 'jumpBoost', 'shield', 'doubleJump', 'health', 'coin'] as const;

export const Vec2 = z.object({
  x: z.number(),
  y: z.number(),
});

export const Rect = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().gt(0),
  height: z.number().gt(0),
});

const Size = z.object({
  width: z.number().gt(0),
  height: z.number().gt(0),
});

const Hitbox = z.object({
  offsetX: z.number().min(0),
  offsetY: z.number().min(0),
  width: z.number().gt(0),
  height: z.number().gt(0),
});

const EntityCore = z.object({
  id: z.string().min(1),
  position: Vec2,
  size: Size,
  velocity: Vec2,
  acceleration: Vec2,
  hitbox: Hitbox,
  grounded: z.boolean(),
});

export const PlayerEntity = EntityCore.extend({
  kind: z.literal('player'),
});

export const PlatformEntity = EntityCore.extend({
  kind: z.literal('platform'),
  variant: z.enum(['ground', 'ledge']),
});

const EnemyBrain = z.object({
  direction: z.union([z.literal(1), z.literal(-1)]),
  anchorX: z.number(),
  timer: z.number().int().min(0),
  interval: z.number().int().min(0),
  ttl: z.number().int().nullable(),
});

export const EnemyEntity = EntityCore.extend({
  kind: z.literal('enemy'),
  variant: z.enum(ENEMY_VARIANTS),
  brain: EnemyBrain,
});

export const PowerUpEntity = EntityCore.extend({
  kind: z.literal('powerUp'),
  variant: z.enum(POWER_UP_VARIANTS),
  value: z.number().int().min(1),
});

export const GoalEntity = EntityCore.extend({
  kind: z.literal('goal'),
});

export const Entity = z.discriminatedUnion('kind', [
  PlayerEntity,
  PlatformEntity,
  EnemyEntity,
  PowerUpEntity,
  GoalEntity,
]);

export const Level = z.object({
  index: z.number().int().min(1),
  seed: z.string(),
  theme: z.enum(THEME_NAMES),
  bounds: Rect,
  start: Vec2,
  goalPosition: Vec2,
  platforms: z.array(PlatformEntity).min(2),
  enemies: z.array(EnemyEntity).default([]),
  powerUps: z.array(PowerUpEntity).default([]),
  goal: GoalEntity,
});

export const ProgressSnapshot = z.object({
  score: z.number().int().min(0),
  coins: z.number().int().min(0),
  levelReached: z.number().int().min(1),
  seed: z.string().optional(),
});

export type Vec2T = z.infer<typeof Vec2>;
export type RectT = z.infer<typeof Rect>;
export type HitboxT = z.infer<typeof Hitbox>;
export type PlayerEntityT = z.infer<typeof PlayerEntity>;
export type PlatformEntityT = z.infer<typeof PlatformEntity>;
export type EnemyEntityT = z.infer<typeof EnemyEntity>;
export type EnemyBrainT = z.infer<typeof EnemyBrain>;
export type PowerUpEntityT = z.infer<typeof PowerUpEntity>;
export type GoalEntityT = z.infer<typeof GoalEntity>;
export type EntityT = z.infer<typeof Entity>;
export type EntityKind = EntityT['kind'];
export type EnemyVariant = (typeof ENEMY_VARIANTS)[number];
export type PowerUpVariant = (typeof POWER_UP_VARIANTS)[number];
export type LevelT = z.infer<typeof Level>;
export type ProgressSnapshotT = z.infer<typeof ProgressSnapshot>;

export * from './config';
export * from './difficulty';
export * from './themes';
