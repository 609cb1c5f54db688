import { LogLevel, type Logger } from '../types/index.js';

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '[DEBUG]',
  [LogLevel.INFO]: '[INFO] ',
  [LogLevel.WARN]: '[WARN] ',
  [LogLevel.ERROR]: '[ERROR]'
};

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
      console.error(line);
      break;
  }
};

function describeMeta(meta: unknown): string {
  if (meta instanceof Error) {
    // Error fields are not enumerable
    return `\n${JSON.stringify({ ...meta, name: meta.name, message: meta.message, stack: meta.stack }, null, 2)}`;
  }
  if (meta !== null && typeof meta === 'object') {
    return `\n${JSON.stringify(meta, null, 2)}`;
  }
  if (meta === undefined || meta === null || meta === '') {
    return '';
  }
  return ` ${String(meta)}`;
}

export function formatLogLine(level: LogLevel, message: string, meta?: unknown, now: Date = new Date()): string {
  return `${now.toISOString()} ${LABELS[level]} ${message}${describeMeta(meta)}`;
}

/**
 * FFBUILD_VERBOSE=1 turns on debug output; otherwise only errors are
 * logged outside development, since the CLI reports progress itself.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env.FFBUILD_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = consoleSink
  ) {}

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (SEVERITY[level] >= SEVERITY[this.level]) {
      this.sink(level, formatLogLine(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const logger = new ConsoleLogger(levelFromEnv(process.env));
