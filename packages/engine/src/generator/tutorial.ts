import type { LevelT, PlatformEntityT } from '@lh/level-spec';

import {
  createPlatform,
  enemyOnPlatform,
  goalOnPlatform,
  PLAYER_HITBOX,
  powerUpOnPlatform,
} from '../entity';

export const TUTORIAL_BOUNDS = { x: 0, y: 0, width: 1100, height: 600 };

const LAYOUT: Array<{ x: number; y: number; width: number; height: number }> = [
  { x: 0, y: 560, width: 240, height: 40 },
  { x: 300, y: 520, width: 120, height: 20 },
  { x: 480, y: 470, width: 120, height: 20 },
  { x: 660, y: 500, width: 140, height: 20 },
  { x: 860, y: 450, width: 160, height: 20 },
];

/** Hand-authored onboarding layout served for level 1 whatever the seed. */
export function tutorialLevel(seed: string | number): LevelT {
  const platforms: PlatformEntityT[] = LAYOUT.map((box, index) =>
    createPlatform(`platform-${index}`, box, index === 0 ? 'ground' : 'ledge'),
  );
  const goal = goalOnPlatform('goal', platforms[4]);

  return {
    index: 1,
    seed: String(seed),
    theme: 'dawn',
    bounds: { ...TUTORIAL_BOUNDS },
    start: { x: 24, y: platforms[0].position.y - PLAYER_HITBOX.height },
    goalPosition: { ...goal.position },
    platforms,
    enemies: [enemyOnPlatform('enemy-0', 'chaser', platforms[3])],
    powerUps: [
      powerUpOnPlatform('powerup-0', 'coin', platforms[1]),
      powerUpOnPlatform('powerup-1', 'coin', platforms[2]),
    ],
    goal,
  };
}
