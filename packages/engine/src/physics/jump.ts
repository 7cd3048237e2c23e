import type { JumpEnvelope, PhysicsConfigT } from '@lh/level-spec';

import { ConfigurationError } from '../errors';
import { integrate } from './integrator';

const MAX_AIR_FRAMES = 10_000;
const LANDING_EPSILON = 1e-6;

export function assertGenerationPhysics(physics: PhysicsConfigT): void {
  const required: Record<string, number> = {
    gravity: physics.gravity,
    jumpVelocity: physics.jumpVelocity,
    maxSpeedX: physics.maxSpeedX,
    maxJumpHeight: physics.maxJumpHeight,
    maxJumpDistance: physics.maxJumpDistance,
  };
  const offending: Record<string, number> = {};
  for (const [name, value] of Object.entries(required)) {
    if (!Number.isFinite(value) || value <= 0) {
      offending[name] = value;
    }
  }
  if (Object.keys(offending).length > 0) {
    throw new ConfigurationError(
      `Cannot generate levels with non-positive ${Object.keys(offending).join(', ')}`,
      offending,
    );
  }
}

/**
 * Steps the integrator through a full-speed jump and records how far and how
 * high it goes. The configured jump caps bound the derived values.
 */
export function jumpEnvelope(physics: PhysicsConfigT): JumpEnvelope {
  assertGenerationPhysics(physics);

  const launch = Math.min(physics.jumpVelocity, physics.maxSpeedY);
  let velocity = { x: physics.maxSpeedX, y: -launch };
  const acceleration = { x: physics.moveAcceleration, y: 0 };
  let x = 0;
  let y = 0;
  let apex = 0;
  let frames = 0;
  const descent: Array<{ x: number; y: number }> = [];

  while (frames < MAX_AIR_FRAMES) {
    const motion = integrate({ velocity, acceleration }, physics);
    velocity = motion.velocity;
    x += motion.delta.x;
    y += motion.delta.y;
    frames += 1;
    apex = Math.max(apex, -y);
    if (velocity.y > 0) {
      descent.push({ x, y });
      if (y >= -LANDING_EPSILON) {
        break;
      }
    }
  }

  const maxHeight = Math.min(apex, physics.maxJumpHeight);
  const maxDistance = Math.min(x, physics.maxJumpDistance);

  const reach: number[] = [];
  for (let rise = 0; rise <= Math.floor(maxHeight); rise += 1) {
    const sample = descent.find((point) => point.y >= -rise - LANDING_EPSILON);
    reach.push(Math.min(sample ? sample.x : 0, maxDistance));
  }

  return { maxHeight, maxDistance, airFrames: frames, reach };
}
