import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = String(raw ?? '').trim().toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
    ? value
    : fallback;
}

function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export interface LoggerOptions {
  /** Mirror every emitted line into this file (appended). */
  filePath?: string;
  /** Console sink, replaceable in tests. */
  sink?: Pick<Console, 'log' | 'warn' | 'error' | 'debug'>;
}

/**
 * Level-filtered console logger with an optional file mirror.
 */
export class Logger {
  private readonly threshold: number;
  private readonly sink: Pick<Console, 'log' | 'warn' | 'error' | 'debug'>;
  private stream: WriteStream | null = null;

  constructor(
    readonly level: LogLevel = 'info',
    options: LoggerOptions = {}
  ) {
    this.threshold = LEVEL_ORDER[level];
    this.sink = options.sink ?? console;
    if (options.filePath) {
      const filePath = expandHome(options.filePath);
      mkdirSync(dirname(filePath), { recursive: true });
      this.stream = createWriteStream(filePath, { flags: 'a' });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.emit('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.emit('error', message, meta);
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
  }

  private emit(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const line =
      meta === undefined
        ? `[${level.toUpperCase()}] ${message}`
        : `[${level.toUpperCase()}] ${message} ${format('%o', meta)}`;

    if (level === 'error') this.sink.error(line);
    else if (level === 'warn') this.sink.warn(line);
    else if (level === 'debug') this.sink.debug(line);
    else this.sink.log(line);

    this.stream?.write(`[${new Date().toISOString()}] ${line}\n`);
  }
}

/** Logger that drops everything; default for library callers and tests. */
export function createSilentLogger(): Logger {
  const noop = (): void => undefined;
  return new Logger('error', { sink: { log: noop, warn: noop, error: noop, debug: noop } });
}
