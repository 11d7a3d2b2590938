import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import pino, { multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';

const packageDirectory = fileURLToPath(new URL('.', import.meta.url));
const repositoryRoot = path.resolve(packageDirectory, '..', '..', '..');

const managedLoggers = new Map<string, ManagedLogger>();

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
  cleanup: () => void;
}

export type Logger = PinoLogger;

function resolveLogRoot(): string {
  const configured = process.env.LOG_DIR?.trim();
  if (configured && configured.length > 0) {
    return path.resolve(configured);
  }
  return path.join(repositoryRoot, 'logs');
}

function isProduction(): boolean {
  return (process.env.NODE_ENV ?? '').toLowerCase() === 'production';
}

function shouldWriteLogFile(): boolean {
  return process.env.LOG_TO_FILE?.trim() !== '0';
}

function shouldCleanLogsOnStart(): boolean {
  const explicit = process.env.CLEAN_LOGS_ON_START?.trim();
  if (explicit === '0') {
    return false;
  }
  if (explicit === '1') {
    return true;
  }
  return !isProduction();
}

function resolveLevel(): string {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && configured.length > 0) {
    return configured;
  }
  return isProduction() ? 'info' : 'debug';
}

function createRunFileName(): string {
  const iso = new Date().toISOString().replace(/[:]/g, '-').replace(/\./g, '-');
  return `session-${iso}-${process.pid}.log`;
}

function prepareServiceLogFile(serviceName: string): { filePath: string; stream: fs.WriteStream } {
  const serviceDir = path.join(resolveLogRoot(), serviceName);

  if (shouldCleanLogsOnStart()) {
    try {
      fs.rmSync(serviceDir, { recursive: true, force: true });
    } catch (error) {
      console.warn(`Failed to clean logs for ${serviceName}:`, error);
    }
  }

  fs.mkdirSync(serviceDir, { recursive: true });

  const filePath = path.join(serviceDir, createRunFileName());
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

function flushStream(stream: fs.WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (stream.destroyed || stream.closed) {
      resolve();
      return;
    }

    stream.write('', 'utf8', () => {
      if (stream.writableNeedDrain) {
        stream.once('drain', () => resolve());
        return;
      }
      resolve();
    });
  });
}

function registerProcessHandlers(logger: Logger, fileStream: fs.WriteStream | null): () => void {
  let flushing = false;

  const handleRejection = (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled promise rejection');
  };

  const handleException = (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
  };

  const handleBeforeExit = async (code: number) => {
    if (flushing) {
      return;
    }
    flushing = true;
    logger.debug({ code }, 'Process exiting, flushing logs');
    try {
      logger.flush?.();
      if (fileStream) {
        await flushStream(fileStream);
      }
    } catch (error) {
      logger.error({ err: error }, 'Failed to flush logs on exit');
    }
  };

  process.on('unhandledRejection', handleRejection);
  process.on('uncaughtException', handleException);
  process.on('beforeExit', handleBeforeExit);

  return () => {
    process.off('unhandledRejection', handleRejection);
    process.off('uncaughtException', handleException);
    process.off('beforeExit', handleBeforeExit);
  };
}

/**
 * Returns the process-wide logger for `serviceName`, creating it on first use.
 * Records go to stdout and, unless `LOG_TO_FILE=0`, to a per-run file under
 * `LOG_DIR/<service>/`.
 */
export function makeLogger(serviceName: string): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const streams: StreamEntry[] = [{ stream: process.stdout }];
  let fileStream: fs.WriteStream | null = null;
  let filePath: string | null = null;
  if (shouldWriteLogFile()) {
    const prepared = prepareServiceLogFile(serviceName);
    fileStream = prepared.stream;
    filePath = prepared.filePath;
    streams.push({ stream: fileStream });
  }

  const baseLogger = pino(
    {
      level: resolveLevel(),
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  const cleanup = registerProcessHandlers(baseLogger, fileStream);
  managedLoggers.set(serviceName, { logger: baseLogger, fileStream, filePath, cleanup });

  return baseLogger;
}

/** Child logger that tags every record with the stage being played. */
export function stageLogger(logger: Logger, world: number, level: number): Logger {
  return logger.child({ stage: `${world}-${level}` });
}

export function getLogFilePath(serviceName: string): string | null {
  const entry = managedLoggers.get(serviceName);
  return entry?.filePath ?? null;
}

export function closeLogger(serviceName: string): void {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }

  entry.cleanup();
  try {
    entry.logger.flush?.();
  } catch (error) {
    console.warn(`Failed to flush logger for ${serviceName}:`, error);
  }
  entry.fileStream?.end();
  managedLoggers.delete(serviceName);
}
