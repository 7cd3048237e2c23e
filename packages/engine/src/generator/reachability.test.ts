import type { JumpEnvelope } from '@lh/level-spec';
import { describe, expect, it } from 'vitest';

import { maxGapForRise, verifyLevelChain } from './reachability';
import { tutorialLevel } from './tutorial';

const envelope: JumpEnvelope = { maxHeight: 60, maxDistance: 100, airFrames: 20, reach: [100, 90, 80] };

describe('verifyLevelChain', () => {
  it('scales the allowed gap by the rise', () => {
    expect(maxGapForRise(envelope, -20)).toBe(90);
    expect(maxGapForRise(envelope, 1)).toBe(81);
    expect(maxGapForRise(envelope, 40)).toBe(72);
  });

  it('names pairs that break the envelope', () => {
    const level = tutorialLevel('check');
    const violations = verifyLevelChain(level, { ...envelope, maxHeight: 45 });
    expect(violations).toEqual([
      { from: 'platform-1', to: 'platform-2', reason: 'rise_too_high', gap: 60, rise: 50 },
      { from: 'platform-3', to: 'platform-4', reason: 'rise_too_high', gap: 60, rise: 50 },
    ]);
  });

  it('flags gaps wider than the reach allows', () => {
    const level = tutorialLevel('check');
    const tight: JumpEnvelope = { maxHeight: 84, maxDistance: 60, airFrames: 20, reach: [60] };
    expect(verifyLevelChain(level, tight).map((violation) => violation.reason)).toEqual([
      'gap_too_wide',
      'gap_too_wide',
      'gap_too_wide',
      'gap_too_wide',
    ]);
  });
});
