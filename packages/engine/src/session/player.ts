import type { PhysicsConfigT, PlayerEntityT } from '@lh/level-spec';

import { resolveMovement, type CollisionEvent, type CollisionWorld } from '../physics/collision';
import { integrate } from '../physics/integrator';
import type { PlayerStatus } from '../status';
import type { FrameInput } from './events';

export const SPEED_BOOST_FACTOR = 1.5;
/** A mid-air jump is allowed once upward speed has dropped below this. */
export const DOUBLE_JUMP_MAX_RISE_SPEED = 8;

export interface PlayerStepContext {
  physics: PhysicsConfigT;
  world: CollisionWorld;
}

export interface PlayerStep {
  player: PlayerEntityT;
  status: PlayerStatus;
  events: CollisionEvent[];
}

export function inputDirection(input: FrameInput): -1 | 0 | 1 {
  if (input.left && !input.right) {
    return -1;
  }
  if (input.right && !input.left) {
    return 1;
  }
  return 0;
}

/**
 * One player tick: input acceleration and jumps, integration, then collision.
 * The position only changes through the resolver's corrected result.
 */
export function advancePlayer(
  player: PlayerEntityT,
  status: PlayerStatus,
  input: FrameInput,
  ctx: PlayerStepContext,
): PlayerStep {
  const { physics } = ctx;
  const boost = status.speedBoost > 0 ? SPEED_BOOST_FACTOR : 1;
  const acceleration = { x: inputDirection(input) * physics.moveAcceleration * boost, y: 0 };
  const velocity = { ...player.velocity };
  let doubleJumpUsed = status.doubleJumpUsed;

  if (input.jumpPressed) {
    const jumpVelocity = status.jumpBoost > 0 ? physics.boostedJumpVelocity : physics.jumpVelocity;
    if (player.grounded) {
      velocity.y = -jumpVelocity;
    } else if (status.doubleJump > 0 && !doubleJumpUsed && -velocity.y < DOUBLE_JUMP_MAX_RISE_SPEED) {
      velocity.y = -jumpVelocity;
      doubleJumpUsed = true;
    }
  }

  const motion = integrate({ velocity, acceleration }, physics);
  const resolution = resolveMovement({ ...player, velocity }, motion, ctx.world);

  return {
    player: {
      ...player,
      position: resolution.position,
      velocity: resolution.velocity,
      acceleration,
      grounded: resolution.grounded,
    },
    status: { ...status, doubleJumpUsed: resolution.grounded ? false : doubleJumpUsed },
    events: resolution.events,
  };
}
