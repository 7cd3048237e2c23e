import { DEFAULT_GAME_CONFIG, type EnemyEntityT, type PlatformEntityT, type PlayerEntityT } from '@lh/level-spec';
import { describe, expect, it } from 'vitest';

import { createEnemy, createPlatform, createPlayer, enemyOnPlatform } from '../entity';
import { createCollisionGrid, type CollisionWorld } from '../physics/collision';
import { createRandom } from '../random';
import { createPlayerStatus } from '../status';
import { IDLE_INPUT, type GameEvent } from './events';
import { stepPlaying, type GameState, type StepContext } from './step';

function setup(platforms: PlatformEntityT[], enemies: EnemyEntityT[], player: PlayerEntityT) {
  const world: CollisionWorld = {
    bounds: { x: 0, y: 0, width: 2000, height: 600 },
    grid: createCollisionGrid([...platforms, ...enemies]),
  };
  const ctx: StepContext = { physics: DEFAULT_GAME_CONFIG.physics, world, rng: createRandom('step-test') };
  const state: GameState = {
    phase: 'playing',
    frame: 0,
    levelIndex: 2,
    seed: 'step-test',
    level: null,
    player,
    status: createPlayerStatus(),
    enemies,
    powerUps: [],
    score: 0,
  };
  return { world, ctx, state };
}

function enemy(state: GameState, id: string): EnemyEntityT | undefined {
  return state.enemies.find((candidate) => candidate.id === id);
}

describe('stepPlaying enemies', () => {
  it('keeps grounded enemies resting on their platform', () => {
    const left = createPlatform('left', { x: 0, y: 560, width: 500, height: 40 }, 'ground');
    const right = createPlatform('right', { x: 500, y: 560, width: 500, height: 40 });
    const home = createPlatform('home', { x: 1400, y: 560, width: 400, height: 40 });
    const patrol = enemyOnPlatform('patrol-0', 'patrol', left);
    const shooter = enemyOnPlatform('shooter-0', 'shooter', right);
    expect(patrol.position).toEqual({ x: 230, y: 520 });
    expect(shooter.position).toEqual({ x: 728, y: 515 });

    const context = setup([left, right, home], [patrol, shooter], createPlayer({ x: 1500, y: 520 }));
    const { ctx } = context;
    let state = context.state;
    for (let tick = 0; tick < 300; tick += 1) {
      state = stepPlaying(state, IDLE_INPUT, ctx).state;
      expect(enemy(state, 'patrol-0')).toMatchObject({ position: { y: 520 }, grounded: true });
      expect(enemy(state, 'shooter-0')).toMatchObject({ position: { x: 728, y: 515 }, grounded: true });
    }
    expect(state.enemies.map((entry) => entry.id)).toEqual(['patrol-0', 'shooter-0']);
  });

  it('turns a patrol around when it walks into a wall', () => {
    const floor = createPlatform('floor', { x: 0, y: 560, width: 1000, height: 40 }, 'ground');
    const wall = createPlatform('wall', { x: 200, y: 440, width: 40, height: 120 });
    const patrol = createEnemy('patrol-0', 'patrol', { x: 250, y: 520 });
    const context = setup([floor, wall], [patrol], createPlayer({ x: 800, y: 520 }));
    let state = context.state;

    let minX = Number.POSITIVE_INFINITY;
    for (let tick = 0; tick < 40; tick += 1) {
      state = stepPlaying(state, IDLE_INPUT, context.ctx).state;
      minX = Math.min(minX, enemy(state, 'patrol-0')?.position.x ?? minX);
    }
    expect(minX).toBe(236);
    const turned = enemy(state, 'patrol-0');
    expect(turned?.brain.direction).toBe(1);
    expect(turned?.position.x ?? 0).toBeGreaterThan(236);
  });

  it('fires a projectile that hurts the player and then disappears', () => {
    const floor = createPlatform('floor', { x: 0, y: 560, width: 1000, height: 40 }, 'ground');
    const shooter = createEnemy('shooter-0', 'shooter', { x: 300, y: 515 });
    const { world, ctx, state: initial } = setup([floor], [shooter], createPlayer({ x: 420, y: 520 }));
    const shotId = 'shooter-0-shot-119';

    let state = initial;
    const hits: GameEvent[] = [];
    for (let tick = 1; tick <= 200; tick += 1) {
      const result = stepPlaying(state, IDLE_INPUT, ctx);
      state = result.state;
      hits.push(...result.events.filter((event) => event.type === 'EnemyHit'));
      if (tick === 120) {
        expect(enemy(state, shotId)).toMatchObject({
          variant: 'projectile',
          position: { x: 319, y: 534 },
          velocity: { x: 3, y: 0 },
        });
        expect(world.grid.get(shotId)).toBeDefined();
      }
    }

    expect(hits).toEqual([
      { type: 'EnemyHit', frame: 154, enemyId: shotId, variant: 'projectile', damaged: true, health: 2 },
    ]);
    expect(state.status.health).toBe(2);
    expect(state.enemies.map((entry) => entry.id)).toEqual(['shooter-0']);
    expect(world.grid.get(shotId)).toBeUndefined();
  });

  it('drops an enemy that walks off a ledge and falls out of the world', () => {
    const ledge = createPlatform('ledge', { x: 100, y: 560, width: 60, height: 40 });
    const home = createPlatform('home', { x: 600, y: 560, width: 200, height: 40 });
    const patrol = enemyOnPlatform('patrol-0', 'patrol', ledge);
    const { world, ctx, state: initial } = setup([ledge, home], [patrol], createPlayer({ x: 650, y: 520 }));
    expect(world.grid.get('patrol-0')).toBeDefined();

    let state = initial;
    for (let tick = 0; tick < 200; tick += 1) {
      state = stepPlaying(state, IDLE_INPUT, ctx).state;
    }
    expect(state.enemies).toEqual([]);
    expect(world.grid.get('patrol-0')).toBeUndefined();
    expect(state.phase).toBe('playing');
  });
});
