import { ProgressSnapshot, type ProgressSnapshotT } from '@lh/level-spec';
import type { Logger } from '@lh/logger';

export interface StartRequest {
  levelIndex: number;
  seed: string;
  score: number;
  coins: number;
}

/**
 * Turns whatever the save store handed back into a start request. Missing or
 * corrupt data falls back to a fresh run from level 1.
 */
export function resolveStart(persisted: unknown, fallbackSeed: string, logger?: Logger): StartRequest {
  const fresh: StartRequest = { levelIndex: 1, seed: fallbackSeed, score: 0, coins: 0 };
  if (persisted === null || persisted === undefined) {
    return fresh;
  }

  let candidate = persisted;
  if (typeof persisted === 'string') {
    try {
      candidate = JSON.parse(persisted);
    } catch (err) {
      logger?.warn({ err }, 'Saved progress is not valid JSON; starting fresh');
      return fresh;
    }
  }

  const parsed = ProgressSnapshot.safeParse(candidate);
  if (!parsed.success) {
    logger?.warn(
      { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      'Discarding corrupt saved progress; starting fresh',
    );
    return fresh;
  }

  return {
    levelIndex: parsed.data.levelReached,
    seed: parsed.data.seed ?? fallbackSeed,
    score: parsed.data.score,
    coins: parsed.data.coins,
  };
}

export function progressSnapshot(score: number, coins: number, levelReached: number, seed: string): ProgressSnapshotT {
  return { score, coins, levelReached, seed };
}
