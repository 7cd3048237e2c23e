import type { EnemyVariant, PowerUpVariant, ProgressSnapshotT } from '@lh/level-spec';

export type PlayerDeathCause = 'enemy' | 'fell';

export type GameEvent =
  | { type: 'PlatformLanding'; frame: number; entityId: string; platformId: string }
  | { type: 'EnemyHit'; frame: number; enemyId: string; variant: EnemyVariant; damaged: boolean; health: number }
  | { type: 'PowerUpCollected'; frame: number; powerUpId: string; variant: PowerUpVariant; value: number }
  | { type: 'GoalReached'; frame: number; goalId: string; levelIndex: number }
  | { type: 'PlayerDied'; frame: number; cause: PlayerDeathCause };

export type GameEventType = GameEvent['type'];

/** Presentation-side consumer of core events and progress snapshots. */
export interface GameEventSink {
  emit(event: GameEvent): void;
  saveProgress(snapshot: ProgressSnapshotT): void;
}

export interface FrameInput {
  left: boolean;
  right: boolean;
  jump: boolean;
  /** Set only on the frame the jump button went down. */
  jumpPressed: boolean;
  pausePressed?: boolean;
}

export interface InputSource {
  poll(): FrameInput;
}

export const IDLE_INPUT: FrameInput = Object.freeze({
  left: false,
  right: false,
  jump: false,
  jumpPressed: false,
});
