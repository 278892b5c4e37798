/**
 * logger.ts
 * Structured logger for the response pipeline.
 *
 * Use ConsoleLogger in applications; MemoryLogger when the lines should be
 * inspected afterwards (tests, audits); SilentLogger when callers do not
 * care about output.
 *
 * Every pipeline component accepts an optional Logger and defaults to
 * SilentLogger.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEFAULT_PREFIX = 'inertia';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function formatLine(
  prefix: string,
  label: string,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${label}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

export class ConsoleLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;

  constructor(level: LogLevel = 'info', prefix = DEFAULT_PREFIX) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['debug']) return;
    this._write('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['info']) return;
    this._write('INFO ', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['warn']) return;
    this._write('WARN ', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['error']) return;
    this._write('ERROR', message, context, true);
  }

  private _write(
    label: string,
    message: string,
    context?: Record<string, unknown>,
    stderr = false,
  ): void {
    const line = formatLine(this._prefix, label, message, context);
    if (stderr) {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryLogger — keeps entries for later inspection
// ---------------------------------------------------------------------------

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: Record<string, unknown>;
}

export class MemoryLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;
  private readonly _entries: LogEntry[] = [];

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_PREFIX) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._append('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._append('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._append('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._append('error', message, context);
  }

  get entries(): readonly LogEntry[] {
    return this._entries;
  }

  /** Entries rendered the way ConsoleLogger prints them. */
  lines(): string[] {
    return this._entries.map((e) =>
      formatLine(this._prefix, e.level.toUpperCase().padEnd(5), e.message, e.context),
    );
  }

  clear(): void {
    this._entries.length = 0;
  }

  private _append(
    level: LogEntry['level'],
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._entries.push(context !== undefined ? { level, message, context } : { level, message });
  }
}

// ---------------------------------------------------------------------------
// SilentLogger — used as default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
