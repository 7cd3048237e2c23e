export type EngineErrorCode = 'degenerate_generation_params' | 'entity_shape_invalid';

/** Tunables that make every level unreachable; generation cannot proceed. */
export class ConfigurationError extends Error {
  readonly code: EngineErrorCode = 'degenerate_generation_params';

  constructor(
    message: string,
    public readonly offending: Record<string, number>,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class EntityShapeError extends Error {
  readonly code: EngineErrorCode = 'entity_shape_invalid';

  constructor(
    message: string,
    public readonly entityId: string,
  ) {
    super(message);
    this.name = 'EntityShapeError';
  }
}
