import type { EnemyEntityT, EnemyVariant, PlayerEntityT } from '@lh/level-spec';

import { createEnemy } from '../entity';
import type { RandomSource } from '../random';
import { ENEMY_SPAWNS } from '../spawn-table';

export const ENEMY_ACCELERATION = 0.2;
export const CHASER_HOP_HEIGHT = 40;
export const CHASER_HOP_VELOCITY = 10;
export const PATROL_RANGE = 150;
export const JUMPER_HOP_VELOCITY = 9;
export const JUMPER_INTERVAL: [number, number] = [60, 120];
export const SHOOTER_COOLDOWN = 120;
export const SHOOTER_RANGE = 200;
export const PROJECTILE_TTL = 180;

export interface BehaviorContext {
  player: PlayerEntityT;
  frame: number;
  rng: RandomSource;
}

export interface EnemyIntent {
  accelerationX?: number;
  jumpVelocity?: number;
  spawn?: EnemyEntityT[];
}

export interface BehaviorResult {
  /** `null` despawns the enemy. */
  enemy: EnemyEntityT | null;
  intent: EnemyIntent;
}

export interface EnemyContact {
  with: 'player' | 'wall' | 'platform';
}

export interface EnemyCapability {
  updateBehavior(enemy: EnemyEntityT, ctx: BehaviorContext): BehaviorResult;
  onCollision(enemy: EnemyEntityT, contact: EnemyContact): EnemyEntityT | null;
}

function centerX(entity: { position: { x: number }; size: { width: number } }): number {
  return entity.position.x + entity.size.width / 2;
}

function facing(enemy: EnemyEntityT, player: PlayerEntityT): 1 | -1 {
  return centerX(player) >= centerX(enemy) ? 1 : -1;
}

function withBrain(enemy: EnemyEntityT, brain: Partial<EnemyEntityT['brain']>): EnemyEntityT {
  return { ...enemy, brain: { ...enemy.brain, ...brain } };
}

function rollInterval(rng: RandomSource): number {
  const [min, max] = JUMPER_INTERVAL;
  return min + Math.floor(rng() * (max - min + 1));
}

const keep = (enemy: EnemyEntityT): EnemyEntityT => enemy;

const chaser: EnemyCapability = {
  updateBehavior(enemy, { player }) {
    const direction = facing(enemy, player);
    const playerBottom = player.position.y + player.hitbox.offsetY + player.hitbox.height;
    const enemyBottom = enemy.position.y + enemy.hitbox.offsetY + enemy.hitbox.height;
    const intent: EnemyIntent = { accelerationX: direction * ENEMY_ACCELERATION };
    if (enemy.grounded && enemyBottom - playerBottom >= CHASER_HOP_HEIGHT) {
      intent.jumpVelocity = CHASER_HOP_VELOCITY;
    }
    return { enemy: withBrain(enemy, { direction }), intent };
  },
  onCollision: keep,
};

const patrol: EnemyCapability = {
  updateBehavior(enemy) {
    let direction = enemy.brain.direction;
    const offset = enemy.position.x - enemy.brain.anchorX;
    if (offset >= PATROL_RANGE) {
      direction = -1;
    } else if (offset <= -PATROL_RANGE) {
      direction = 1;
    }
    return {
      enemy: withBrain(enemy, { direction }),
      intent: { accelerationX: direction * ENEMY_ACCELERATION },
    };
  },
  onCollision(enemy, contact) {
    if (contact.with === 'wall') {
      return withBrain(
        { ...enemy, velocity: { x: 0, y: enemy.velocity.y } },
        { direction: enemy.brain.direction === 1 ? -1 : 1 },
      );
    }
    return enemy;
  },
};

const jumper: EnemyCapability = {
  updateBehavior(enemy, { player, rng }) {
    const interval = enemy.brain.interval > 0 ? enemy.brain.interval : rollInterval(rng);
    const timer = enemy.brain.timer + 1;
    const direction = facing(enemy, player);
    if (enemy.grounded && timer >= interval) {
      return {
        enemy: withBrain(enemy, { direction, timer: 0, interval: rollInterval(rng) }),
        intent: { jumpVelocity: JUMPER_HOP_VELOCITY, accelerationX: direction * ENEMY_ACCELERATION },
      };
    }
    return {
      enemy: withBrain(enemy, { direction, timer, interval }),
      intent: { accelerationX: enemy.grounded ? 0 : direction * ENEMY_ACCELERATION },
    };
  },
  onCollision: keep,
};

const shooter: EnemyCapability = {
  updateBehavior(enemy, { player, frame }) {
    const direction = facing(enemy, player);
    const timer = enemy.brain.timer + 1;
    const inRange = Math.abs(centerX(player) - centerX(enemy)) <= SHOOTER_RANGE;
    if (timer < SHOOTER_COOLDOWN || !inRange) {
      return { enemy: withBrain(enemy, { direction, timer }), intent: {} };
    }

    const size = ENEMY_SPAWNS.projectile.size;
    const projectile = createEnemy(
      `${enemy.id}-shot-${frame}`,
      'projectile',
      {
        x: Math.round(centerX(enemy) - size.width / 2),
        y: Math.round(enemy.position.y + enemy.size.height / 2 - size.height / 2),
      },
      {
        direction,
        velocity: { x: direction * ENEMY_SPAWNS.projectile.speed, y: 0 },
        ttl: PROJECTILE_TTL,
      },
    );
    return {
      enemy: withBrain(enemy, { direction, timer: 0 }),
      intent: { spawn: [projectile] },
    };
  },
  onCollision: keep,
};

const projectile: EnemyCapability = {
  updateBehavior(enemy) {
    const ttl = (enemy.brain.ttl ?? PROJECTILE_TTL) - 1;
    if (ttl <= 0) {
      return { enemy: null, intent: {} };
    }
    return { enemy: withBrain(enemy, { ttl }), intent: {} };
  },
  onCollision(enemy, contact) {
    return contact.with === 'platform' ? enemy : null;
  },
};

export const ENEMY_BEHAVIORS: Readonly<Record<EnemyVariant, EnemyCapability>> = {
  chaser,
  patrol,
  jumper,
  shooter,
  projectile,
};
