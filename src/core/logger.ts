/**
 * logger.ts — Timestamped, per-module progress logger for the solver.
 *
 * Every module creates its own instance with a context label, so a chain run
 * reads as a single narrative:
 *
 *   [2026-10-19T09:14:02.113Z] [INFO ] [QuizSolver] Step 2 — classified as statistic
 *
 * The minimum level comes from LOG_LEVEL (debug | info | warn | error) and is
 * read once per instance.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

/**
 * Usage:
 *   const logger = new Logger('PageFetcher');
 *   logger.info('Static fetch returned a placeholder shell, rendering…');
 */
export class Logger {
  /** Label prepended to every line so multi-module output stays readable. */
  private readonly context: string;
  private readonly minLevel: LogLevel;

  constructor(context: string, minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.context = context;
    this.minLevel = minLevel;
  }

  // ── Public API ─────────────────────────────────────────

  /** Prompt sizes, raw replies, heuristic signals. Hidden by default. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page fetched, task classified, answer submitted. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but recoverable: retry scheduled, attachment skipped. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A step or chain failure. The raw error is printed on its own line. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && this.enabled('error')) {
      console.error(err);
    }
  }

  /** Child logger sharing the level, e.g. `logger.child('chain-1a2b')`. */
  child(suffix: string): Logger {
    return new Logger(`${this.context}:${suffix}`, this.minLevel);
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  /** `[ISO timestamp] [LEVEL] [Context] message` */
  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}
