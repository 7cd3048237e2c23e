export const START_HEALTH = 3;
export const MAX_HEALTH = 5;
export const INVINCIBILITY_FRAMES = 120;

/** Player-side counters that survive level transitions within a session. */
export interface PlayerStatus {
  health: number;
  coins: number;
  invincibleFrames: number;
  speedBoost: number;
  jumpBoost: number;
  shield: number;
  doubleJump: number;
  doubleJumpUsed: boolean;
}

export function createPlayerStatus(coins = 0): PlayerStatus {
  return {
    health: START_HEALTH,
    coins,
    invincibleFrames: 0,
    speedBoost: 0,
    jumpBoost: 0,
    shield: 0,
    doubleJump: 0,
    doubleJumpUsed: false,
  };
}

/** Counts every timed effect down by one frame. */
export function tickStatus(status: PlayerStatus): PlayerStatus {
  return {
    ...status,
    invincibleFrames: Math.max(0, status.invincibleFrames - 1),
    speedBoost: Math.max(0, status.speedBoost - 1),
    jumpBoost: Math.max(0, status.jumpBoost - 1),
    shield: Math.max(0, status.shield - 1),
    doubleJump: Math.max(0, status.doubleJump - 1),
  };
}

export function isVulnerable(status: PlayerStatus): boolean {
  return status.shield <= 0 && status.invincibleFrames <= 0;
}

export function applyDamage(status: PlayerStatus): PlayerStatus {
  if (!isVulnerable(status)) {
    return status;
  }
  return {
    ...status,
    health: Math.max(0, status.health - 1),
    invincibleFrames: INVINCIBILITY_FRAMES,
  };
}
