import { z } from 'zod';

export const TIER_NAMES = ['foothills', 'ridge', 'cliffs', 'spires', 'summit'] as const;

const Range = z
  .tuple([z.number(), z.number()])
  .refine(([min, max]) => min <= max, { message: 'range minimum must not exceed its maximum' });

// Degenerate jump values are let through here; the generator refuses them with a ConfigurationError.
export const PhysicsConfig = z.object({
  gravity: z.number().default(0.8),
  moveAcceleration: z.number().gt(0).default(0.5),
  friction: z.number().min(0).max(1).default(0.12),
  maxSpeedX: z.number().default(6),
  maxSpeedY: z.number().gt(0).default(16),
  jumpVelocity: z.number().default(12),
  boostedJumpVelocity: z.number().gt(0).default(16),
  maxJumpHeight: z.number().default(120),
  maxJumpDistance: z.number().default(180),
  restSpeed: z.number().min(0).default(0.01),
});

export const WorldConfig = z
  .object({
    height: z.number().int().gt(0).default(600),
    floorTop: z.number().int().default(560),
    minTop: z.number().int().min(0).default(160),
    platformThickness: z.number().int().gt(0).default(20),
    groundThickness: z.number().int().gt(0).default(40),
    startPlatformWidth: z.number().int().gt(0).default(160),
    endPadding: z.number().int().min(0).default(80),
  })
  .refine((world) => world.minTop < world.floorTop && world.floorTop < world.height, {
    message: 'world band must satisfy minTop < floorTop < height',
  });

export const DifficultyTier = z.object({
  name: z.enum(TIER_NAMES),
  fromLevel: z.number().int().min(1),
  gapFraction: Range,
  riseFraction: z.number().gt(0).max(1),
  enemyDensity: z.number().min(0).max(1),
  powerUpDensity: z.number().min(0).max(1),
  platformCount: z.number().int().min(3),
  platformWidth: Range,
});

export type PhysicsConfigT = z.infer<typeof PhysicsConfig>;
export type WorldConfigT = z.infer<typeof WorldConfig>;
export type DifficultyTierT = z.infer<typeof DifficultyTier>;

export const DEFAULT_TIERS: DifficultyTierT[] = [
  {
    name: 'foothills',
    fromLevel: 2,
    gapFraction: [0.3, 0.5],
    riseFraction: 0.5,
    enemyDensity: 0.15,
    powerUpDensity: 0.35,
    platformCount: 8,
    platformWidth: [96, 160],
  },
  {
    name: 'ridge',
    fromLevel: 5,
    gapFraction: [0.35, 0.6],
    riseFraction: 0.6,
    enemyDensity: 0.25,
    powerUpDensity: 0.3,
    platformCount: 10,
    platformWidth: [88, 144],
  },
  {
    name: 'cliffs',
    fromLevel: 10,
    gapFraction: [0.4, 0.7],
    riseFraction: 0.7,
    enemyDensity: 0.35,
    powerUpDensity: 0.25,
    platformCount: 12,
    platformWidth: [80, 128],
  },
  {
    name: 'spires',
    fromLevel: 20,
    gapFraction: [0.45, 0.8],
    riseFraction: 0.75,
    enemyDensity: 0.45,
    powerUpDensity: 0.22,
    platformCount: 14,
    platformWidth: [72, 120],
  },
  {
    name: 'summit',
    fromLevel: 35,
    gapFraction: [0.5, 0.85],
    riseFraction: 0.8,
    enemyDensity: 0.55,
    powerUpDensity: 0.2,
    platformCount: 16,
    platformWidth: [64, 112],
  },
];

export const GameConfigSchema = z.object({
  physics: PhysicsConfig.default({}),
  world: WorldConfig.default({}),
  tiers: z
    .array(DifficultyTier)
    .min(1)
    .default(DEFAULT_TIERS)
    .superRefine((tiers, ctx) => {
      for (let index = 1; index < tiers.length; index += 1) {
        const previous = tiers[index - 1];
        const current = tiers[index];
        if (current.fromLevel <= previous.fromLevel) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'fromLevel'],
            message: 'tiers must be ordered by strictly increasing fromLevel',
          });
        }
        if (
          current.gapFraction[0] < previous.gapFraction[0] ||
          current.gapFraction[1] < previous.gapFraction[1]
        ) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'gapFraction'],
            message: 'gap range must not shrink between tiers',
          });
        }
        if (current.enemyDensity < previous.enemyDensity) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'enemyDensity'],
            message: 'enemy density must not decrease between tiers',
          });
        }
      }
    }),
});

export type GameConfigT = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;

export const DEFAULT_GAME_CONFIG: GameConfigT = GameConfigSchema.parse({});

const PHYSICS_ENV: Array<[string, keyof PhysicsConfigT]> = [
  ['GRAVITY', 'gravity'],
  ['MAX_SPEED_X', 'maxSpeedX'],
  ['MAX_SPEED_Y', 'maxSpeedY'],
  ['FRICTION', 'friction'],
  ['JUMP_VELOCITY', 'jumpVelocity'],
  ['MAX_JUMP_HEIGHT', 'maxJumpHeight'],
  ['MAX_JUMP_DISTANCE', 'maxJumpDistance'],
];

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  const parsed = Number.parseFloat(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Builds a validated game config from the defaults, applying physics overrides from the environment.
 * Throws a `ZodError` when an override leaves the tunables invalid.
 */
export function loadGameConfig(
  env: NodeJS.ProcessEnv = process.env,
  base: GameConfigInput = {},
): GameConfigT {
  const physics: Partial<PhysicsConfigT> = { ...base.physics };
  for (const [name, key] of PHYSICS_ENV) {
    const override = parseNumber(env[name]);
    if (override !== undefined) {
      physics[key] = override;
    }
  }
  return GameConfigSchema.parse({ ...base, physics });
}
