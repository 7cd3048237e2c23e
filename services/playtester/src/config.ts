import 'dotenv/config';

import { z } from 'zod';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true');

const PlaytestEnv = z
  .object({
    PLAYTEST_FROM: z.coerce.number().int().min(1).default(1),
    PLAYTEST_TO: z.coerce.number().int().min(1).default(20),
    PLAYTEST_SEED: z.string().trim().min(1).default('playtest'),
    PLAYTEST_SEARCH: flag.default('1'),
    PLAYTEST_REPORT: z.string().trim().min(1).optional(),
    PLAYTEST_TIME_LIMIT_MS: z.coerce.number().int().positive().default(3000),
    PLAYTEST_MAX_NODES: z.coerce.number().int().positive().default(60000),
  })
  .refine((env) => env.PLAYTEST_FROM <= env.PLAYTEST_TO, {
    message: 'PLAYTEST_FROM must not exceed PLAYTEST_TO',
    path: ['PLAYTEST_TO'],
  });

const env = PlaytestEnv.parse(process.env);

export const cfg = {
  from: env.PLAYTEST_FROM,
  to: env.PLAYTEST_TO,
  seed: env.PLAYTEST_SEED,
  search: env.PLAYTEST_SEARCH,
  reportPath: env.PLAYTEST_REPORT ?? null,
  searchTimeLimitMs: env.PLAYTEST_TIME_LIMIT_MS,
  searchMaxNodes: env.PLAYTEST_MAX_NODES,
} as const;

export type Config = typeof cfg;
