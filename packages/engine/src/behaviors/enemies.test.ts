import { describe, expect, it } from 'vitest';

import { createEnemy, createPlayer } from '../entity';
import { ENEMY_BEHAVIORS } from './enemies';

const never = () => 0;

describe('enemy behaviours', () => {
  it('turns a patrol around at the edge of its range', () => {
    const patrol = createEnemy('patrol', 'patrol', { x: 100, y: 0 });
    const player = createPlayer({ x: 0, y: 0 });
    const ctx = { player, frame: 1, rng: never };

    const right = ENEMY_BEHAVIORS.patrol.updateBehavior({ ...patrol, position: { x: 250, y: 0 } }, ctx);
    expect(right.enemy?.brain.direction).toBe(-1);
    expect(right.intent.accelerationX).toBe(-0.2);

    const left = ENEMY_BEHAVIORS.patrol.updateBehavior({ ...patrol, position: { x: -50, y: 0 } }, ctx);
    expect(left.enemy?.brain.direction).toBe(1);
    expect(left.intent.accelerationX).toBe(0.2);
  });

  it('reverses a patrol that walks into a wall', () => {
    const patrol = { ...createEnemy('patrol', 'patrol', { x: 100, y: 0 }), velocity: { x: -0.8, y: 0 } };
    const bounced = ENEMY_BEHAVIORS.patrol.onCollision(patrol, { with: 'wall' });
    expect(bounced?.brain.direction).toBe(1);
    expect(bounced?.velocity).toEqual({ x: 0, y: 0 });
  });

  it('hops a grounded chaser when the player stands well above it', () => {
    const chaser = { ...createEnemy('chaser', 'chaser', { x: 100, y: 100 }), grounded: true };
    const above = ENEMY_BEHAVIORS.chaser.updateBehavior(chaser, {
      player: createPlayer({ x: 300, y: 50 }),
      frame: 1,
      rng: never,
    });
    expect(above.intent).toEqual({ accelerationX: 0.2, jumpVelocity: 10 });

    const level = ENEMY_BEHAVIORS.chaser.updateBehavior(chaser, {
      player: createPlayer({ x: 0, y: 80 }),
      frame: 1,
      rng: never,
    });
    expect(level.intent).toEqual({ accelerationX: -0.2 });
    expect(level.enemy?.brain.direction).toBe(-1);
  });

  it('rolls the jumper interval and hops once it elapses', () => {
    const player = createPlayer({ x: 300, y: 0 });
    const jumper = { ...createEnemy('jumper', 'jumper', { x: 100, y: 0 }), grounded: true };

    const waiting = ENEMY_BEHAVIORS.jumper.updateBehavior(jumper, { player, frame: 1, rng: never });
    expect(waiting.enemy?.brain).toMatchObject({ interval: 60, timer: 1 });
    expect(waiting.intent).toEqual({ accelerationX: 0 });

    const ready = { ...jumper, brain: { ...jumper.brain, interval: 60, timer: 59 } };
    const hop = ENEMY_BEHAVIORS.jumper.updateBehavior(ready, { player, frame: 2, rng: () => 0.5 });
    expect(hop.intent).toEqual({ jumpVelocity: 9, accelerationX: 0.2 });
    expect(hop.enemy?.brain).toMatchObject({ timer: 0, interval: 90 });
  });

  it('fires a projectile once the cooldown is over and the player is in range', () => {
    const shooter = createEnemy('e', 'shooter', { x: 100, y: 0 });
    const primed = { ...shooter, brain: { ...shooter.brain, timer: 119 } };

    const result = ENEMY_BEHAVIORS.shooter.updateBehavior(primed, {
      player: createPlayer({ x: 200, y: 0 }),
      frame: 7,
      rng: never,
    });
    expect(result.enemy?.brain.timer).toBe(0);
    expect(result.intent.spawn).toHaveLength(1);
    const [shot] = result.intent.spawn ?? [];
    expect(shot.id).toBe('e-shot-7');
    expect(shot.variant).toBe('projectile');
    expect(shot.position).toEqual({ x: 119, y: 19 });
    expect(shot.velocity).toEqual({ x: 3, y: 0 });
    expect(shot.brain.ttl).toBe(180);
  });

  it('holds fire while the player is out of range', () => {
    const shooter = createEnemy('e', 'shooter', { x: 100, y: 0 });
    const primed = { ...shooter, brain: { ...shooter.brain, timer: 119 } };
    const result = ENEMY_BEHAVIORS.shooter.updateBehavior(primed, {
      player: createPlayer({ x: 400, y: 0 }),
      frame: 7,
      rng: never,
    });
    expect(result.intent).toEqual({});
    expect(result.enemy?.brain.timer).toBe(120);
  });

  it('expires projectiles and removes them on contact', () => {
    const shot = createEnemy('shot', 'projectile', { x: 0, y: 0 }, { ttl: 5 });
    const ctx = { player: createPlayer({ x: 0, y: 0 }), frame: 1, rng: never };

    expect(ENEMY_BEHAVIORS.projectile.updateBehavior(shot, ctx).enemy?.brain.ttl).toBe(4);
    const last = { ...shot, brain: { ...shot.brain, ttl: 1 } };
    expect(ENEMY_BEHAVIORS.projectile.updateBehavior(last, ctx).enemy).toBeNull();
    expect(ENEMY_BEHAVIORS.projectile.onCollision(shot, { with: 'player' })).toBeNull();
    expect(ENEMY_BEHAVIORS.projectile.onCollision(shot, { with: 'platform' })).toBe(shot);
  });
});
