import { Logger, LogLevel } from '../types/index.js';

const ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Diagnostic log on stderr, kept apart from the user-facing output ports so
 * stdout stays clean for piping. Quiet (errors only) unless raised with
 * --verbose, CRAFTPKG_VERBOSE=1 or CRAFTPKG_LOG_LEVEL.
 */
class StderrLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.ERROR,
    private readonly write: (line: string) => void = line => process.stderr.write(`${line}\n`)
  ) {}

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (ORDER.indexOf(level) < ORDER.indexOf(this.level)) {
      return;
    }
    let line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}`;
    if (meta !== undefined && meta !== null) {
      line += typeof meta === 'object' ? ` ${JSON.stringify(meta, errorReplacer)}` : ` ${String(meta)}`;
    }
    this.write(line);
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * JSON.stringify(new Error()) is {}, so errors (including nested ones in
 * meta objects) are expanded to name/message/stack.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      ...value,
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }
  return value;
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.CRAFTPKG_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  const requested = env.CRAFTPKG_LOG_LEVEL?.toLowerCase();
  return ORDER.find(level => level === requested) ?? LogLevel.ERROR;
}

export const logger = new StderrLogger(levelFromEnv());

export { StderrLogger };
