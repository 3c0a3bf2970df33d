import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redactContext } from './redact.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  message: string;
  traceId?: string;
  context: Record<string, unknown>;
}

export type LogSink = (entry: StructuredLogEntry) => void;

export interface SwarmLoggerOptions {
  /** Minimum level written (default: info). */
  level?: LogLevel;
  /** Append every entry as a JSON line to this file. */
  logPath?: string;
  /** Emit raw JSON lines on stderr instead of the human-readable form. */
  json?: boolean;
  /** Suppress stderr output entirely. */
  silent?: boolean;
  /** Extra destination for entries, used by tests to capture output. */
  sink?: LogSink;
}

export interface LoggerState {
  readonly level: LogLevel;
  readonly logPath?: string;
  readonly json: boolean;
  readonly silent: boolean;
  readonly sink?: LogSink;
  dirReady: boolean;
}

/**
 * Structured JSONL logger.
 * Every line is a self-contained JSON object; bound fields (such as the trace id)
 * are carried by child loggers that share the parent's destinations.
 */
export class SwarmLogger {
  private readonly state: LoggerState;
  private readonly bound: Record<string, unknown>;

  constructor(opts: SwarmLoggerOptions = {}, parent?: { state: LoggerState; bound: Record<string, unknown> }) {
    this.state = parent?.state ?? {
      level: opts.level ?? 'info',
      logPath: opts.logPath,
      json: opts.json ?? false,
      silent: opts.silent ?? false,
      sink: opts.sink,
      dirReady: false,
    };
    this.bound = parent?.bound ?? {};
  }

  /** Logger that discards everything; the default where no logger is injected. */
  static silent(): SwarmLogger {
    return new SwarmLogger({ silent: true, level: 'fatal' });
  }

  child(bound: Record<string, unknown>): SwarmLogger {
    return new SwarmLogger({}, { state: this.state, bound: { ...this.bound, ...bound } });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.state.level];
  }

  private write(level: LogLevel, event: string, message: string, context: Record<string, unknown> = {}): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const { traceId, ...rest } = { ...this.bound, ...context };
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      message,
      traceId: typeof traceId === 'string' ? traceId : undefined,
      context: redactContext(rest),
    };
    const line = JSON.stringify(entry);

    if (this.state.logPath !== undefined) {
      if (!this.state.dirReady) {
        mkdirSync(dirname(this.state.logPath), { recursive: true });
        this.state.dirReady = true;
      }
      appendFileSync(this.state.logPath, line + '\n', 'utf-8');
    }

    this.state.sink?.(entry);

    if (this.state.silent) {
      return;
    }

    if (this.state.json) {
      process.stderr.write(line + '\n');
    } else {
      const prefix = level === 'error' || level === 'fatal' ? '!' : level === 'warn' ? '?' : '-';
      const trace = entry.traceId !== undefined ? ` (${entry.traceId.slice(0, 8)})` : '';
      process.stderr.write(`${prefix} [${level}]${trace} ${message}\n`);
    }
  }

  debug(event: string, message: string, context?: Record<string, unknown>): void {
    this.write('debug', event, message, context);
  }

  info(event: string, message: string, context?: Record<string, unknown>): void {
    this.write('info', event, message, context);
  }

  warn(event: string, message: string, context?: Record<string, unknown>): void {
    this.write('warn', event, message, context);
  }

  error(event: string, message: string, context?: Record<string, unknown>): void {
    this.write('error', event, message, context);
  }

  fatal(event: string, message: string, context?: Record<string, unknown>): void {
    this.write('fatal', event, message, context);
  }
}
