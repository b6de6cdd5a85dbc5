// src/core/logger.ts
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export type LogSink = (line: string) => void;

// stdout is reserved for command output (--json), so everything goes to stderr
const stderrSink: LogSink = (line) => console.error(line);

class Logger {
  private level: LogLevel = 'warn';
  private sink: LogSink = stderrSink;

  constructor() {
    const envLevel = process.env.MEDIA_RESOLVER_LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.level = envLevel;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSink(sink: LogSink | null): void {
    this.sink = sink ?? stderrSink;
  }

  scope(name: string): ScopedLogger {
    return new ScopedLogger(this, name);
  }

  write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, error?: unknown): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) return;

    let details = '';
    if (error instanceof Error) {
      details = `: ${error.message}`;
    } else if (error !== undefined) {
      details = `: ${String(error)}`;
    }

    this.sink(`[${scope}] ${level.toUpperCase()} ${message}${details}`);
  }
}

export class ScopedLogger {
  constructor(private readonly root: Logger, private readonly name: string) {}

  debug(message: string): void {
    this.root.write('debug', this.name, message);
  }

  info(message: string): void {
    this.root.write('info', this.name, message);
  }

  warn(message: string, error?: unknown): void {
    this.root.write('warn', this.name, message, error);
  }

  error(message: string, error?: unknown): void {
    this.root.write('error', this.name, message, error);
  }
}

export const logger = new Logger();
