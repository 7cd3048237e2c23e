import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import pino, { multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';

const packageDirectory = fileURLToPath(new URL('.', import.meta.url));
const repositoryRoot = path.resolve(packageDirectory, '..', '..', '..');

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: string;
  toFile?: boolean;
  logDir?: string;
}

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
  detach: () => void;
}

const managedLoggers = new Map<string, ManagedLogger>();

function resolveLogRoot(configured: string | undefined): string {
  const candidate = (configured ?? process.env.LOG_DIR)?.trim();
  if (candidate && candidate.length > 0) {
    return path.resolve(candidate);
  }
  return path.join(repositoryRoot, 'logs');
}

function resolveFileSink(explicit: boolean | undefined): boolean {
  if (typeof explicit === 'boolean') {
    return explicit;
  }
  const flag = process.env.LOG_TO_FILE?.trim();
  if (flag === '0') {
    return false;
  }
  if (flag === '1') {
    return true;
  }
  return (process.env.NODE_ENV ?? '').toLowerCase() !== 'test';
}

function runFileName(): string {
  const iso = new Date().toISOString().replace(/[:.]/g, '-');
  return `run-${iso}-${process.pid}.log`;
}

function openRunFile(serviceName: string, logDir: string | undefined): { filePath: string; stream: fs.WriteStream } {
  const serviceDir = path.join(resolveLogRoot(logDir), serviceName);
  fs.mkdirSync(serviceDir, { recursive: true });
  const filePath = path.join(serviceDir, runFileName());
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

function attachProcessHandlers(logger: Logger): () => void {
  const onRejection = (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled promise rejection');
  };
  const onException = (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
  };

  process.on('unhandledRejection', onRejection);
  process.on('uncaughtException', onException);

  return () => {
    process.off('unhandledRejection', onRejection);
    process.off('uncaughtException', onException);
  };
}

/**
 * Returns the pino logger for a service, creating it on first use.
 * Output goes to stdout and, unless disabled, to a per-run file under `LOG_DIR/<service>/`.
 */
export function makeLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const level = (options.level ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const streams: StreamEntry[] = [{ stream: process.stdout }];

  let fileStream: fs.WriteStream | null = null;
  let filePath: string | null = null;
  if (resolveFileSink(options.toFile)) {
    const runFile = openRunFile(serviceName, options.logDir);
    fileStream = runFile.stream;
    filePath = runFile.filePath;
    streams.push({ stream: runFile.stream });
  }

  const logger = pino(
    {
      level,
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  managedLoggers.set(serviceName, {
    logger,
    fileStream,
    filePath,
    detach: attachProcessHandlers(logger),
  });

  return logger;
}

export function getLogFilePath(serviceName: string): string | null {
  return managedLoggers.get(serviceName)?.filePath ?? null;
}

export function closeLogger(serviceName: string): void {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }

  entry.detach();
  entry.logger.flush();
  entry.fileStream?.end();
  managedLoggers.delete(serviceName);
}
