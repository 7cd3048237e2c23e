import type {
  EntityKind,
  GameConfigT,
  LevelT,
  ProgressSnapshotT,
  ThemeName,
  Vec2T,
} from '@lh/level-spec';
import type { Logger } from '@lh/logger';

import { createPlayer } from '../entity';
import { buildLevel as buildDefaultLevel } from '../generator/generator';
import { createCollisionGrid, type CollisionWorld } from '../physics/collision';
import { createRandom, type RandomSource } from '../random';
import { createPlayerStatus, type PlayerStatus } from '../status';
import { FixedStepClock, type ClockOptions } from './clock';
import type { FrameInput, GameEvent, GameEventSink, InputSource } from './events';
import { progressSnapshot, type StartRequest } from './progress';
import { stepPlaying, type GamePhase, type GameState } from './step';

export type LevelBuilder = (levelIndex: number, seed: string, config: GameConfigT) => LevelT;

export interface GameSessionDeps {
  config: GameConfigT;
  input: InputSource;
  sink: GameEventSink;
  logger?: Logger;
  buildLevel?: LevelBuilder;
  clock?: ClockOptions;
}

export interface EntitySnapshot {
  readonly id: string;
  readonly kind: EntityKind;
  readonly variant?: string;
  readonly position: Readonly<Vec2T>;
  readonly size: { readonly width: number; readonly height: number };
}

export interface RenderSnapshot {
  readonly frame: number;
  readonly phase: GamePhase;
  readonly levelIndex: number;
  readonly theme: ThemeName | null;
  readonly score: number;
  readonly status: Readonly<PlayerStatus>;
  readonly entities: readonly EntitySnapshot[];
}

interface LevelRuntime {
  world: CollisionWorld;
  rng: RandomSource;
}

function snapshotOf(entity: {
  id: string;
  kind: EntityKind;
  variant?: string;
  position: Vec2T;
  size: { width: number; height: number };
}): EntitySnapshot {
  return {
    id: entity.id,
    kind: entity.kind,
    ...(entity.variant ? { variant: entity.variant } : {}),
    position: { ...entity.position },
    size: { ...entity.size },
  };
}

/**
 * Fixed-timestep orchestrator. Owns the game state and walks it through
 * loading, playing, paused, levelComplete and gameOver.
 */
export class GameSession {
  private state: GameState;

  private runtime: LevelRuntime | null = null;

  private readonly clock: FixedStepClock;

  private readonly build: LevelBuilder;

  constructor(private readonly deps: GameSessionDeps) {
    this.clock = new FixedStepClock(deps.clock);
    this.build = deps.buildLevel ?? ((levelIndex, seed, config) => buildDefaultLevel(levelIndex, seed, config, { logger: deps.logger }));
    this.state = {
      phase: 'loading',
      frame: 0,
      levelIndex: 1,
      seed: '',
      level: null,
      player: createPlayer({ x: 0, y: 0 }),
      status: createPlayerStatus(),
      enemies: [],
      powerUps: [],
      score: 0,
    };
  }

  start(request: Pick<StartRequest, 'levelIndex' | 'seed'> & Partial<StartRequest>): void {
    this.state = {
      ...this.state,
      frame: 0,
      seed: request.seed,
      score: request.score ?? 0,
      status: createPlayerStatus(request.coins ?? 0),
    };
    this.loadLevel(request.levelIndex);
  }

  /** Polls input once and runs however many fixed ticks the elapsed time buys. */
  frame(elapsedMs: number): GameEvent[] {
    const input = this.deps.input.poll();
    if (input.pausePressed) {
      this.togglePause();
    }

    const steps = this.clock.advance(elapsedMs);
    const events: GameEvent[] = [];
    for (let index = 0; index < steps; index += 1) {
      const tickInput: FrameInput = index === 0 ? input : { ...input, jumpPressed: false, pausePressed: false };
      events.push(...this.tick(tickInput));
    }
    return events;
  }

  tick(input: FrameInput): GameEvent[] {
    switch (this.state.phase) {
      case 'loading':
      case 'paused':
      case 'gameOver':
        return [];
      case 'levelComplete':
        this.loadLevel(this.state.levelIndex + 1);
        return [];
      case 'playing':
        return this.play(input);
    }
  }

  togglePause(): GamePhase {
    if (this.state.phase === 'playing') {
      this.transition('paused');
    } else if (this.state.phase === 'paused') {
      this.transition('playing');
    }
    return this.state.phase;
  }

  getState(): Readonly<GameState> {
    return this.state;
  }

  progress(): ProgressSnapshotT {
    return progressSnapshot(this.state.score, this.state.status.coins, this.state.levelIndex, this.state.seed);
  }

  snapshot(): RenderSnapshot {
    const { level } = this.state;
    const entities: EntitySnapshot[] = [];
    if (level) {
      entities.push(...level.platforms.map(snapshotOf));
      entities.push(snapshotOf(level.goal));
    }
    entities.push(...this.state.powerUps.map(snapshotOf));
    entities.push(...this.state.enemies.map(snapshotOf));
    entities.push(snapshotOf(this.state.player));

    return {
      frame: this.state.frame,
      phase: this.state.phase,
      levelIndex: this.state.levelIndex,
      theme: level ? level.theme : null,
      score: this.state.score,
      status: { ...this.state.status },
      entities,
    };
  }

  private play(input: FrameInput): GameEvent[] {
    const runtime = this.runtime;
    if (!runtime) {
      return [];
    }
    const result = stepPlaying(this.state, input, {
      physics: this.deps.config.physics,
      world: runtime.world,
      rng: runtime.rng,
    });
    const previous = this.state.phase;
    this.state = result.state;
    for (const event of result.events) {
      this.deps.sink.emit(event);
    }

    if (this.state.phase !== previous) {
      this.deps.logger?.info(
        { from: previous, to: this.state.phase, levelIndex: this.state.levelIndex, score: this.state.score },
        'Game phase changed',
      );
      this.deps.sink.saveProgress(this.progress());
    }
    return result.events;
  }

  private loadLevel(levelIndex: number): void {
    this.transition('loading');
    const level = this.build(levelIndex, this.state.seed, this.deps.config);
    const world: CollisionWorld = {
      bounds: { ...level.bounds },
      grid: createCollisionGrid([...level.platforms, ...level.powerUps, ...level.enemies, level.goal]),
    };
    this.runtime = { world, rng: createRandom(this.state.seed, level.index, 'ai') };
    this.clock.reset();

    this.state = {
      ...this.state,
      levelIndex: level.index,
      level,
      player: createPlayer(level.start),
      status: { ...this.state.status, invincibleFrames: 0, doubleJumpUsed: false },
      enemies: level.enemies.map((enemy) => ({ ...enemy })),
      powerUps: level.powerUps.map((powerUp) => ({ ...powerUp })),
    };
    this.deps.logger?.debug({ levelIndex: level.index, seed: this.state.seed }, 'Level loaded');
    this.transition('playing');
  }

  private transition(phase: GamePhase): void {
    if (this.state.phase === phase) {
      return;
    }
    this.deps.logger?.info({ from: this.state.phase, to: phase, levelIndex: this.state.levelIndex }, 'Game phase changed');
    this.state = { ...this.state, phase };
  }
}
