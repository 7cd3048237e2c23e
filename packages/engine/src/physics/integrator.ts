import type { PhysicsConfigT, Vec2T } from '@lh/level-spec';

export interface IntegrableBody {
  velocity: Vec2T;
  acceleration: Vec2T;
  gravityScale?: number;
  frictionScale?: number;
}

export interface IntegrateOptions {
  /** Step length in frames. */
  dt?: number;
  /** Overrides the configured horizontal speed limit. */
  maxSpeedX?: number;
}

/** Updated velocity plus the tentative position delta; the position itself is left alone. */
export interface Motion {
  velocity: Vec2T;
  delta: Vec2T;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function integrate(
  body: IntegrableBody,
  physics: PhysicsConfigT,
  options: IntegrateOptions = {},
): Motion {
  const dt = options.dt ?? 1;
  const maxSpeedX = Math.abs(options.maxSpeedX ?? physics.maxSpeedX);
  const gravityScale = body.gravityScale ?? 1;
  const frictionScale = body.frictionScale ?? 1;

  let vx = body.velocity.x;
  if (body.acceleration.x !== 0) {
    vx += body.acceleration.x * dt;
  } else {
    vx *= Math.max(0, 1 - physics.friction * dt * frictionScale);
    if (Math.abs(vx) < physics.restSpeed) {
      vx = 0;
    }
  }
  vx = clamp(vx, -maxSpeedX, maxSpeedX);

  let vy = body.velocity.y + (body.acceleration.y + physics.gravity * gravityScale) * dt;
  vy = clamp(vy, -physics.maxSpeedY, physics.maxSpeedY);

  return {
    velocity: { x: vx, y: vy },
    delta: { x: vx * dt, y: vy * dt },
  };
}
