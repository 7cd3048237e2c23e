import type { PowerUpVariant } from '@lh/level-spec';

import { POWER_UP_SPAWNS } from '../spawn-table';
import { MAX_HEALTH, type PlayerStatus } from '../status';

export interface PowerUpCapability {
  onCollect(status: PlayerStatus, value: number): PlayerStatus;
}

function timed(key: 'speedBoost' | 'jumpBoost' | 'shield' | 'doubleJump'): PowerUpCapability {
  const frames = POWER_UP_SPAWNS[key].durationFrames ?? 0;
  return {
    onCollect: (status) => {
      const next = { ...status };
      next[key] = frames;
      if (key === 'doubleJump') {
        next.doubleJumpUsed = false;
      }
      return next;
    },
  };
}

export const POWER_UP_EFFECTS: Readonly<Record<PowerUpVariant, PowerUpCapability>> = {
  speedBoost: timed('speedBoost'),
  jumpBoost: timed('jumpBoost'),
  shield: timed('shield'),
  doubleJump: timed('doubleJump'),
  health: {
    onCollect: (status) => ({ ...status, health: Math.min(MAX_HEALTH, status.health + 1) }),
  },
  coin: {
    onCollect: (status, value) => ({ ...status, coins: status.coins + value }),
  },
};

export const COIN_SCORE = 10;

export function collectPowerUp(
  status: PlayerStatus,
  variant: PowerUpVariant,
  value: number,
): { status: PlayerStatus; score: number } {
  return {
    status: POWER_UP_EFFECTS[variant].onCollect(status, value),
    score: variant === 'coin' ? COIN_SCORE * value : 0,
  };
}
