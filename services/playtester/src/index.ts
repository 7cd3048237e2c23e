import fs from 'node:fs';
import path from 'node:path';

import { loadGameConfig } from '@lh/level-spec';
import { closeLogger } from '@lh/logger';

import { cfg } from './config';
import { logger } from './logger';
import { runPlaytest, type PlaytestReport } from './playtest';

function writeReport(report: PlaytestReport, target: string): string {
  const resolved = path.resolve(target);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return resolved;
}

async function main(): Promise<number> {
  const config = loadGameConfig(process.env);
  logger.info(
    { from: cfg.from, to: cfg.to, seed: cfg.seed, search: cfg.search, physics: config.physics },
    'Booting playtest run',
  );

  const controller = new AbortController();
  (['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
    process.once(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');
      controller.abort();
    });
  });

  const report = await runPlaytest({
    from: cfg.from,
    to: cfg.to,
    seed: cfg.seed,
    config,
    logger,
    search: cfg.search ? { timeLimitMs: cfg.searchTimeLimitMs, maxNodes: cfg.searchMaxNodes } : null,
    signal: controller.signal,
  });

  if (cfg.reportPath) {
    const written = writeReport(report, cfg.reportPath);
    logger.info({ path: written }, 'Wrote playtest report');
  }

  logger.info(
    { levels: report.levels.length, failures: report.failures, completed: report.completed },
    'Playtest run finished',
  );
  return report.failures > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.fatal({ err: error }, 'Playtest run failed');
    process.exitCode = 1;
  })
  .finally(() => closeLogger('playtester'));
