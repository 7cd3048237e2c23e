import type {
  EnemyEntityT,
  EnemyVariant,
  GoalEntityT,
  PlatformEntityT,
  PlayerEntityT,
  PowerUpEntityT,
  PowerUpVariant,
  RectT,
  Vec2T,
} from '@lh/level-spec';

import { boxesOverlap, hitboxAt, unionBox, type Box } from '../entity';
import type { Motion } from './integrator';
import { SpatialGrid } from './spatial-grid';

export const COLLISION_EPSILON = 1e-6;
const BROAD_PHASE_MARGIN = 8;

export type Collidable = PlatformEntityT | EnemyEntityT | PowerUpEntityT | GoalEntityT;
export type Mover = PlayerEntityT | EnemyEntityT;

export type CollisionEvent =
  | { type: 'PlatformLanding'; entityId: string; platformId: string }
  | { type: 'EnemyHit'; enemyId: string; variant: EnemyVariant }
  | { type: 'PowerUpCollected'; powerUpId: string; variant: PowerUpVariant; value: number }
  | { type: 'GoalReached'; goalId: string };

export interface CollisionWorld {
  bounds: RectT;
  grid: SpatialGrid<Collidable>;
}

export interface Resolution {
  position: Vec2T;
  velocity: Vec2T;
  grounded: boolean;
  blockedX: boolean;
  bumpedHead: boolean;
  events: CollisionEvent[];
}

export function createCollisionGrid(entities: Iterable<Collidable> = []): SpatialGrid<Collidable> {
  const grid = new SpatialGrid<Collidable>((entity) => hitboxAt(entity));
  for (const entity of entities) {
    grid.insert(entity);
  }
  return grid;
}

function expand(box: Box, margin: number): Box {
  return {
    x: box.x - margin,
    y: box.y - margin,
    width: box.width + margin * 2,
    height: box.height + margin * 2,
  };
}

function overlapsX(a: Box, b: Box): boolean {
  return a.x < b.x + b.width - COLLISION_EPSILON && a.x + a.width > b.x + COLLISION_EPSILON;
}

function overlapsY(a: Box, b: Box): boolean {
  return a.y < b.y + b.height - COLLISION_EPSILON && a.y + a.height > b.y + COLLISION_EPSILON;
}

/**
 * Resolves a tentative move against platforms and level walls, then classifies
 * what the mover touched. Vertical motion is swept first, horizontal motion is
 * swept at the corrected height.
 */
export function resolveMovement(mover: Mover, motion: Motion, world: CollisionWorld): Resolution {
  const start = hitboxAt(mover);
  const target = hitboxAt(mover, {
    x: mover.position.x + motion.delta.x,
    y: mover.position.y + motion.delta.y,
  });
  const candidates = world.grid.query(expand(unionBox(start, target), BROAD_PHASE_MARGIN));
  const platforms = candidates.filter(
    (candidate): candidate is PlatformEntityT => candidate.kind === 'platform',
  );

  const velocity = { ...motion.velocity };
  let y = mover.position.y + motion.delta.y;
  let grounded = false;
  let bumpedHead = false;
  let landedOn: PlatformEntityT | null = null;

  const dy = motion.delta.y;
  if (dy > 0) {
    const bottom = start.y + start.height;
    let surface = Number.POSITIVE_INFINITY;
    for (const platform of platforms) {
      const box = hitboxAt(platform);
      if (!overlapsX(start, box)) {
        continue;
      }
      if (bottom <= box.y + COLLISION_EPSILON && bottom + dy >= box.y && box.y < surface) {
        surface = box.y;
        landedOn = platform;
      }
    }
    if (landedOn) {
      y = surface - mover.hitbox.offsetY - mover.hitbox.height;
      velocity.y = 0;
      grounded = true;
    }
  } else if (dy < 0) {
    const top = start.y;
    let ceiling = Number.NEGATIVE_INFINITY;
    for (const platform of platforms) {
      const box = hitboxAt(platform);
      if (!overlapsX(start, box)) {
        continue;
      }
      const underside = box.y + box.height;
      if (top >= underside - COLLISION_EPSILON && top + dy <= underside && underside > ceiling) {
        ceiling = underside;
      }
    }
    if (ceiling > Number.NEGATIVE_INFINITY) {
      y = ceiling - mover.hitbox.offsetY;
      velocity.y = 0;
      bumpedHead = true;
    }
  }

  const settled = hitboxAt(mover, { x: mover.position.x, y });
  const dx = motion.delta.x;
  let x = mover.position.x + dx;
  let blockedX = false;

  if (dx > 0) {
    const right = settled.x + settled.width;
    let wall = world.bounds.x + world.bounds.width;
    for (const platform of platforms) {
      const box = hitboxAt(platform);
      if (!overlapsY(settled, box)) {
        continue;
      }
      if (right <= box.x + COLLISION_EPSILON && right + dx > box.x && box.x < wall) {
        wall = box.x;
      }
    }
    if (right + dx > wall) {
      x = wall - mover.hitbox.offsetX - mover.hitbox.width;
      blockedX = true;
    }
  } else if (dx < 0) {
    const left = settled.x;
    let wall = world.bounds.x;
    for (const platform of platforms) {
      const box = hitboxAt(platform);
      if (!overlapsY(settled, box)) {
        continue;
      }
      const face = box.x + box.width;
      if (left >= face - COLLISION_EPSILON && left + dx < face && face > wall) {
        wall = face;
      }
    }
    if (left + dx < wall) {
      x = wall - mover.hitbox.offsetX;
      blockedX = true;
    }
  }
  if (blockedX) {
    velocity.x = 0;
  }

  const position = { x, y };
  const events: CollisionEvent[] = [];

  if (grounded && landedOn && !mover.grounded) {
    events.push({ type: 'PlatformLanding', entityId: mover.id, platformId: landedOn.id });
  }

  if (mover.kind === 'player') {
    const finalBox = hitboxAt(mover, position);
    const swept = unionBox(start, finalBox);
    for (const candidate of candidates) {
      switch (candidate.kind) {
        case 'enemy':
          if (boxesOverlap(finalBox, hitboxAt(candidate))) {
            events.push({ type: 'EnemyHit', enemyId: candidate.id, variant: candidate.variant });
          }
          break;
        case 'powerUp':
          if (boxesOverlap(swept, hitboxAt(candidate))) {
            events.push({
              type: 'PowerUpCollected',
              powerUpId: candidate.id,
              variant: candidate.variant,
              value: candidate.value,
            });
          }
          break;
        case 'goal':
          if (boxesOverlap(swept, hitboxAt(candidate))) {
            events.push({ type: 'GoalReached', goalId: candidate.id });
          }
          break;
        case 'platform':
          break;
      }
    }
  }

  return { position, velocity, grounded, blockedX, bumpedHead, events };
}
