import { describe, expect, it } from 'vitest';

import { createPlayerStatus } from '../status';
import { collectPowerUp, POWER_UP_EFFECTS } from './powerups';

describe('collectPowerUp', () => {
  it('adds coin value to the wallet and the score', () => {
    const { status, score } = collectPowerUp(createPlayerStatus(4), 'coin', 3);
    expect(status.coins).toBe(7);
    expect(score).toBe(30);
  });

  it('starts timed effects at their full duration', () => {
    const base = createPlayerStatus();
    expect(collectPowerUp(base, 'speedBoost', 1).status.speedBoost).toBe(300);
    expect(collectPowerUp(base, 'jumpBoost', 1).status.jumpBoost).toBe(300);
    expect(collectPowerUp(base, 'shield', 1).status.shield).toBe(1800);
    expect(collectPowerUp(base, 'shield', 1).score).toBe(0);
  });

  it('re-arms the double jump', () => {
    const spent = { ...createPlayerStatus(), doubleJump: 3, doubleJumpUsed: true };
    const status = POWER_UP_EFFECTS.doubleJump.onCollect(spent, 1);
    expect(status.doubleJump).toBe(240);
    expect(status.doubleJumpUsed).toBe(false);
  });

  it('caps health at the maximum', () => {
    const full = { ...createPlayerStatus(), health: 5 };
    expect(collectPowerUp(full, 'health', 1).status.health).toBe(5);
    expect(collectPowerUp(createPlayerStatus(), 'health', 1).status.health).toBe(4);
  });
});
