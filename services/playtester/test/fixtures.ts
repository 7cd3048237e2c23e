import { createPlatform, goalOnPlatform } from '@lh/engine';
import type { LevelT, PlatformEntityT } from '@lh/level-spec';

/** Small hand-built layouts for exercising the search and the playtest runner. */
export function layout(levelIndex: number, platforms: PlatformEntityT[]): LevelT {
  const last = platforms[platforms.length - 1];
  const goal = goalOnPlatform('goal', last);
  return {
    index: levelIndex,
    seed: 'fixture',
    theme: 'noon',
    bounds: { x: 0, y: 0, width: last.position.x + last.size.width + 80, height: 600 },
    start: { x: 24, y: 520 },
    goalPosition: { ...goal.position },
    platforms,
    enemies: [],
    powerUps: [],
    goal,
  };
}

export const flatLevel = (levelIndex = 2): LevelT =>
  layout(levelIndex, [createPlatform('floor', { x: 0, y: 560, width: 400, height: 40 }, 'ground')]);

export const ledgeLevel = (levelIndex = 2): LevelT =>
  layout(levelIndex, [
    createPlatform('floor', { x: 0, y: 560, width: 200, height: 40 }, 'ground'),
    createPlatform('ledge', { x: 260, y: 510, width: 200, height: 20 }),
  ]);

export const chasmLevel = (levelIndex = 2): LevelT =>
  layout(levelIndex, [
    createPlatform('floor', { x: 0, y: 560, width: 200, height: 40 }, 'ground'),
    createPlatform('far', { x: 600, y: 560, width: 200, height: 40 }),
  ]);
