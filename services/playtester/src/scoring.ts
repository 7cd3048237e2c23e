import { ENEMY_SPAWNS, platformRight } from '@lh/engine';
import type { LevelT } from '@lh/level-spec';

const GAP_MAX_PX = 180;
const AVG_GAP_MAX_PX = 150;

const K_ENEMY = 3;
const K_ENEMY_SPEED = 0.5;
const K_VERTICALITY = 0.02;
const K_RISE = 0.1;

interface GapStats {
  maxGap: number;
  avgGap: number;
  maxRise: number;
}

function computeGapStats(level: LevelT): GapStats {
  const platforms = [...level.platforms].sort((a, b) => a.position.x - b.position.x);
  let maxGap = 0;
  let sumGap = 0;
  let gaps = 0;
  let maxRise = 0;

  for (let i = 0; i < platforms.length - 1; i += 1) {
    const current = platforms[i];
    const next = platforms[i + 1];
    maxRise = Math.max(maxRise, current.position.y - next.position.y);
    const gap = next.position.x - platformRight(current);
    if (gap <= 0) {
      continue;
    }
    gaps += 1;
    sumGap += gap;
    maxGap = Math.max(maxGap, gap);
  }

  return { maxGap, avgGap: gaps > 0 ? sumGap / gaps : 0, maxRise };
}

function computeStdDev(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/** Rough difficulty of a layout; higher is harder. Only used for reporting. */
export function scoreLevel(level: LevelT): number {
  const { maxGap, avgGap, maxRise } = computeGapStats(level);
  const gapScore = Math.min(maxGap / GAP_MAX_PX, 1) * 40 + Math.min(avgGap / AVG_GAP_MAX_PX, 1) * 20;

  const enemyCount = level.enemies.length;
  const avgEnemySpeed =
    enemyCount > 0
      ? level.enemies.reduce((sum, enemy) => sum + ENEMY_SPAWNS[enemy.variant].speed, 0) / enemyCount
      : 0;
  const enemyScore = K_ENEMY * enemyCount + K_ENEMY_SPEED * avgEnemySpeed;

  const verticalityScore = K_VERTICALITY * computeStdDev(level.platforms.map((platform) => platform.position.y));
  const riseScore = K_RISE * maxRise;

  const score = gapScore + enemyScore + verticalityScore + riseScore;
  return Number.isFinite(score) ? Math.max(score, 0) : 0;
}
