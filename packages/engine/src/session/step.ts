import type {
  EnemyEntityT,
  LevelT,
  PhysicsConfigT,
  PlayerEntityT,
  PowerUpEntityT,
} from '@lh/level-spec';

import { collectPowerUp } from '../behaviors/powerups';
import { ENEMY_BEHAVIORS } from '../behaviors/enemies';
import { resolveMovement, type CollisionWorld } from '../physics/collision';
import { integrate } from '../physics/integrator';
import type { RandomSource } from '../random';
import { ENEMY_SPAWNS } from '../spawn-table';
import { applyDamage, tickStatus, type PlayerStatus } from '../status';
import type { FrameInput, GameEvent } from './events';
import { advancePlayer } from './player';

export const LEVEL_COMPLETE_BONUS = 100;

export type GamePhase = 'loading' | 'playing' | 'paused' | 'levelComplete' | 'gameOver';

export interface GameState {
  phase: GamePhase;
  frame: number;
  levelIndex: number;
  seed: string;
  level: LevelT | null;
  player: PlayerEntityT;
  status: PlayerStatus;
  enemies: EnemyEntityT[];
  powerUps: PowerUpEntityT[];
  score: number;
}

/**
 * Per-level runtime handed to each tick. `world.grid` is kept in sync with the
 * live enemies and power-ups of the returned state.
 */
export interface StepContext {
  physics: PhysicsConfigT;
  world: CollisionWorld;
  rng: RandomSource;
}

export interface StepResult {
  state: GameState;
  events: GameEvent[];
}

function belowWorld(entity: { position: { y: number } }, world: CollisionWorld): boolean {
  return entity.position.y > world.bounds.y + world.bounds.height;
}

function outsideWorldX(entity: EnemyEntityT, world: CollisionWorld): boolean {
  return (
    entity.position.x + entity.size.width < world.bounds.x ||
    entity.position.x > world.bounds.x + world.bounds.width
  );
}

function stepEnemies(state: GameState, ctx: StepContext): EnemyEntityT[] {
  const { world } = ctx;
  const survivors: EnemyEntityT[] = [];
  const spawned: EnemyEntityT[] = [];

  for (const enemy of state.enemies) {
    const behavior = ENEMY_BEHAVIORS[enemy.variant];
    const decided = behavior.updateBehavior(enemy, {
      player: state.player,
      frame: state.frame,
      rng: ctx.rng,
    });
    let current = decided.enemy;
    if (!current) {
      world.grid.remove(enemy.id);
      continue;
    }
    spawned.push(...(decided.intent.spawn ?? []));

    const spawn = ENEMY_SPAWNS[current.variant];
    const velocity = { ...current.velocity };
    if (decided.intent.jumpVelocity && current.grounded) {
      velocity.y = -decided.intent.jumpVelocity;
    }
    const acceleration = { x: decided.intent.accelerationX ?? 0, y: 0 };
    const motion = integrate(
      {
        velocity,
        acceleration,
        gravityScale: spawn.gravityScale,
        frictionScale: spawn.frictionScale,
      },
      ctx.physics,
      { maxSpeedX: spawn.speed },
    );

    if (spawn.collidesWithPlatforms) {
      const resolution = resolveMovement({ ...current, velocity }, motion, world);
      current = {
        ...current,
        position: resolution.position,
        velocity: resolution.velocity,
        acceleration,
        grounded: resolution.grounded,
      };
      if (resolution.blockedX) {
        current = behavior.onCollision(current, { with: 'wall' });
      }
      if (current && resolution.events.some((event) => event.type === 'PlatformLanding')) {
        current = behavior.onCollision(current, { with: 'platform' });
      }
    } else {
      current = {
        ...current,
        position: {
          x: current.position.x + motion.delta.x,
          y: current.position.y + motion.delta.y,
        },
        velocity: motion.velocity,
        acceleration,
      };
    }

    if (!current || belowWorld(current, world) || outsideWorldX(current, world)) {
      world.grid.remove(enemy.id);
      continue;
    }
    world.grid.move(current);
    survivors.push(current);
  }

  for (const enemy of spawned) {
    world.grid.insert(enemy);
    survivors.push(enemy);
  }
  return survivors;
}

/**
 * One playing tick: enemies act, the player moves and resolves, then terminal
 * conditions are evaluated. Events come back in the order they happened.
 */
export function stepPlaying(state: GameState, input: FrameInput, ctx: StepContext): StepResult {
  const frame = state.frame + 1;
  const events: GameEvent[] = [];
  const { world } = ctx;

  let enemies = stepEnemies(state, ctx);
  const moved = advancePlayer(
    state.player,
    tickStatus(state.status),
    input,
    { physics: ctx.physics, world },
  );
  let status = moved.status;
  let powerUps = state.powerUps;
  let score = state.score;
  let goalReached: string | null = null;

  for (const event of moved.events) {
    switch (event.type) {
      case 'PlatformLanding':
        events.push({ ...event, frame });
        break;
      case 'EnemyHit': {
        const enemy = enemies.find((candidate) => candidate.id === event.enemyId);
        if (!enemy) {
          break;
        }
        const before = status.health;
        status = applyDamage(status);
        events.push({
          ...event,
          frame,
          damaged: status.health < before,
          health: status.health,
        });
        const after = ENEMY_BEHAVIORS[enemy.variant].onCollision(enemy, { with: 'player' });
        if (!after) {
          world.grid.remove(enemy.id);
          enemies = enemies.filter((candidate) => candidate.id !== enemy.id);
        }
        break;
      }
      case 'PowerUpCollected': {
        if (!powerUps.some((candidate) => candidate.id === event.powerUpId)) {
          break;
        }
        const collected = collectPowerUp(status, event.variant, event.value);
        status = collected.status;
        score += collected.score;
        powerUps = powerUps.filter((candidate) => candidate.id !== event.powerUpId);
        world.grid.remove(event.powerUpId);
        events.push({ ...event, frame });
        break;
      }
      case 'GoalReached':
        goalReached = event.goalId;
        break;
    }
  }

  let player = moved.player;
  let phase: GamePhase = state.phase;
  if (belowWorld(player, world)) {
    status = { ...status, health: 0 };
    phase = 'gameOver';
    events.push({ type: 'PlayerDied', frame, cause: 'fell' });
  } else if (status.health <= 0) {
    phase = 'gameOver';
    events.push({ type: 'PlayerDied', frame, cause: 'enemy' });
  } else if (goalReached) {
    score += LEVEL_COMPLETE_BONUS * state.levelIndex;
    phase = 'levelComplete';
    player = { ...player, velocity: { x: 0, y: 0 }, acceleration: { x: 0, y: 0 } };
    events.push({ type: 'GoalReached', frame, goalId: goalReached, levelIndex: state.levelIndex });
  }

  return {
    state: { ...state, phase, frame, player, status, enemies, powerUps, score },
    events,
  };
}
