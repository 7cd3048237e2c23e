import { createHash } from 'node:crypto';

import type { LevelT } from '@lh/level-spec';
import stringify from 'fast-json-stable-stringify';

/** Stable sha1 over the placements of a level; ids and velocities are left out. */
export function levelSignature(level: LevelT): string {
  const core = stringify({
    index: level.index,
    theme: level.theme,
    platforms: level.platforms.map((platform) => [
      platform.position.x,
      platform.position.y,
      platform.size.width,
      platform.size.height,
    ]),
    enemies: level.enemies.map((enemy) => [enemy.variant, enemy.position.x, enemy.position.y]),
    powerUps: level.powerUps.map((powerUp) => [
      powerUp.variant,
      powerUp.value,
      powerUp.position.x,
      powerUp.position.y,
    ]),
    goal: [level.goal.position.x, level.goal.position.y],
  });
  const hash = createHash('sha1');
  hash.update(core);
  return hash.digest('hex');
}
