export const DEFAULT_STEP_MS = 1000 / 60;
const DEFAULT_MAX_STEPS_PER_FRAME = 5;
const DEFAULT_MAX_FRAME_DELTA_MS = 100;

export interface ClockOptions {
  readonly stepMs?: number;
  readonly maxStepsPerFrame?: number;
  readonly maxFrameDeltaMs?: number;
}

/** Turns elapsed wall time into a bounded number of fixed simulation ticks. */
export class FixedStepClock {
  readonly stepMs: number;

  private readonly maxStepsPerFrame: number;

  private readonly maxFrameDeltaMs: number;

  private accumulatorMs = 0;

  constructor(options: ClockOptions = {}) {
    const configured = options.stepMs ?? DEFAULT_STEP_MS;
    this.stepMs = configured > 0 ? configured : DEFAULT_STEP_MS;
    this.maxStepsPerFrame = Math.max(1, Math.floor(options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME));
    // A frame clamp below one step would never tick.
    this.maxFrameDeltaMs = Math.max(this.stepMs, options.maxFrameDeltaMs ?? DEFAULT_MAX_FRAME_DELTA_MS);
  }

  advance(elapsedMs: number): number {
    let frameDeltaMs = Number.isFinite(elapsedMs) ? elapsedMs : 0;
    if (frameDeltaMs < 0) {
      frameDeltaMs = 0;
    }
    if (frameDeltaMs > this.maxFrameDeltaMs) {
      frameDeltaMs = this.maxFrameDeltaMs;
    }

    this.accumulatorMs += frameDeltaMs;
    let steps = 0;
    while (this.accumulatorMs >= this.stepMs && steps < this.maxStepsPerFrame) {
      this.accumulatorMs -= this.stepMs;
      steps += 1;
    }

    if (steps === this.maxStepsPerFrame && this.accumulatorMs > this.stepMs) {
      this.accumulatorMs = this.stepMs;
    }
    return steps;
  }

  /** Interpolation factor between the last two ticks. */
  get alpha(): number {
    return Math.min(1, this.accumulatorMs / this.stepMs);
  }

  reset(): void {
    this.accumulatorMs = 0;
  }
}
