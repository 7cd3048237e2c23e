import {
  buildLevel as buildDefaultLevel,
  jumpEnvelope,
  levelSignature,
  verifyLevelChain,
  type ChainViolation,
  type LevelBuilder,
} from '@lh/engine';
import type { GameConfigT, ThemeName } from '@lh/level-spec';
import type { Logger } from '@lh/logger';

import { scoreLevel } from './scoring';
import { replayPath, searchLevel, type SearchFailReason } from './sim/search';

export interface PlaytestOptions {
  from: number;
  to: number;
  seed: string;
  config: GameConfigT;
  logger: Logger;
  search?: { timeLimitMs: number; maxNodes: number } | null;
  buildLevel?: LevelBuilder;
  signal?: AbortSignal;
}

export interface SearchReport {
  ok: boolean;
  reason?: SearchFailReason | 'replay_mismatch';
  actions?: number;
  nodes: number;
  durationMs: number;
}

export interface LevelReport {
  levelIndex: number;
  signature: string;
  theme: ThemeName;
  width: number;
  platforms: number;
  enemies: number;
  powerUps: number;
  difficulty: number;
  violations: ChainViolation[];
  search: SearchReport | null;
  ok: boolean;
}

export interface PlaytestReport {
  seed: string;
  from: number;
  to: number;
  completed: boolean;
  failures: number;
  levels: LevelReport[];
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

/**
 * Builds every level in `[from, to]`, checks the platform chain against the
 * jump envelope and, when enabled, searches for a route to the goal.
 */
export async function runPlaytest(options: PlaytestOptions): Promise<PlaytestReport> {
  const { config, logger, seed } = options;
  const build: LevelBuilder =
    options.buildLevel ?? ((levelIndex, levelSeed, gameConfig) => buildDefaultLevel(levelIndex, levelSeed, gameConfig, { logger }));
  const envelope = jumpEnvelope(config.physics);
  const levels: LevelReport[] = [];
  let completed = true;

  for (let levelIndex = options.from; levelIndex <= options.to; levelIndex += 1) {
    if (options.signal?.aborted) {
      logger.warn({ levelIndex }, 'Playtest aborted before finishing the range');
      completed = false;
      break;
    }

    const level = build(levelIndex, seed, config);
    const violations = verifyLevelChain(level, envelope);

    let search: SearchReport | null = null;
    if (options.search) {
      const outcome = searchLevel(level, { physics: config.physics, ...options.search });
      search = { ok: outcome.ok, nodes: outcome.nodesExpanded, durationMs: outcome.durationMs };
      if (outcome.reason) {
        search.reason = outcome.reason;
      }
      if (outcome.ok && outcome.path) {
        search.actions = outcome.actions?.length ?? 0;
        if (!replayPath(level, outcome.path, config.physics)) {
          search.ok = false;
          search.reason = 'replay_mismatch';
        }
      }
    }

    const report: LevelReport = {
      levelIndex: level.index,
      signature: levelSignature(level),
      theme: level.theme,
      width: level.bounds.width,
      platforms: level.platforms.length,
      enemies: level.enemies.length,
      powerUps: level.powerUps.length,
      difficulty: scoreLevel(level),
      violations,
      search,
      ok: violations.length === 0 && (search ? search.ok : true),
    };
    levels.push(report);

    if (report.ok) {
      logger.info(
        { levelIndex: report.levelIndex, difficulty: report.difficulty, nodes: search?.nodes },
        'Level passed playtest',
      );
    } else {
      logger.warn(
        { levelIndex: report.levelIndex, violations, search: search?.reason },
        'Level failed playtest',
      );
    }
    await yieldToEventLoop();
  }

  return {
    seed,
    from: options.from,
    to: options.to,
    completed,
    failures: levels.filter((level) => !level.ok).length,
    levels,
  };
}
