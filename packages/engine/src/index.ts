export * from './errors';
export * from './entity';
export * from './random';
export * from './spawn-table';
export * from './status';
export * from './physics/integrator';
export * from './physics/jump';
export * from './physics/spatial-grid';
export * from './physics/collision';
export * from './generator/generator';
export * from './generator/reachability';
export * from './generator/signature';
export * from './generator/tutorial';
export * from './behaviors/enemies';
export * from './behaviors/powerups';
export * from './session/clock';
export * from './session/events';
export * from './session/player';
export * from './session/progress';
export * from './session/step';
export * from './session/session';
