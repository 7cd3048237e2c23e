import type { JumpEnvelope, LevelT } from '@lh/level-spec';

import { platformRight, platformTop } from '../entity';

export type ChainViolationReason = 'gap_too_wide' | 'rise_too_high' | 'overlapping_platforms';

export interface ChainViolation {
  from: string;
  to: string;
  reason: ChainViolationReason;
  gap: number;
  rise: number;
}

/** Share of the per-rise reach a generated gap may use. */
export const REACH_SAFETY = 0.9;

/** Widest gap allowed before a platform that sits `rise` px higher (negative rises use the flat reach). */
export function reachLimit(reach: number[], rise: number): number {
  if (reach.length === 0) {
    return 0;
  }
  const index = Math.min(Math.max(0, Math.floor(rise)), reach.length - 1);
  return Math.floor(reach[index] * REACH_SAFETY);
}

export function maxGapForRise(envelope: JumpEnvelope, rise: number): number {
  return Math.min(envelope.maxDistance, reachLimit(envelope.reach, rise));
}

/**
 * Checks every consecutive platform pair against the jump envelope. An empty
 * result means the chain from start to goal is traversable.
 */
export function verifyLevelChain(level: LevelT, envelope: JumpEnvelope): ChainViolation[] {
  const violations: ChainViolation[] = [];
  for (let index = 1; index < level.platforms.length; index += 1) {
    const from = level.platforms[index - 1];
    const to = level.platforms[index];
    const gap = to.position.x - platformRight(from);
    const rise = platformTop(from) - platformTop(to);
    const pair = { from: from.id, to: to.id, gap, rise };

    if (gap < 0) {
      violations.push({ ...pair, reason: 'overlapping_platforms' });
    } else if (rise > envelope.maxHeight) {
      violations.push({ ...pair, reason: 'rise_too_high' });
    } else if (gap > maxGapForRise(envelope, rise)) {
      violations.push({ ...pair, reason: 'gap_too_wide' });
    }
  }
  return violations;
}
