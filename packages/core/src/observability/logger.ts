/**
 * Leveled logging for views. Nothing is written unless a handler or JSON
 * output is configured.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

export interface SeqLoggerConfig {
  /** Default: 'info' */
  readonly level?: LogLevel;
  /** Forces the level to 'debug' */
  readonly debug?: boolean;
  /** Prefix of every entry's `module`; children append `:<name>` */
  readonly module?: string;
  /** Receives entries instead of the console */
  readonly handler?: (entry: LogEntry) => void;
  /** Print entries as JSON lines on the console */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Process-wide override that enables debug entries on every logger */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * @example
 * ```typescript
 * const log = createLogger({ module: 'views', level: 'debug', handler: (e) => entries.push(e) });
 * const end = log.time('baseline');
 * end({ size: 12 }); // debug entry 'baseline completed' with durationMs
 * ```
 */
export class SeqLogger {
  private readonly config: Required<Omit<SeqLoggerConfig, 'handler' | 'json'>> &
    Pick<SeqLoggerConfig, 'handler' | 'json'>;

  constructor(config: SeqLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'seqview',
      handler: config.handler,
      json: config.json,
    };
  }

  child(subModule: string): SeqLogger {
    return new SeqLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  /** Same output, different minimum level */
  withLevel(level: LogLevel): SeqLogger {
    return new SeqLogger({ ...this.config, debug: false, level });
  }

  isEnabled(level: LogLevel): boolean {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effectiveLevel];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    });
  }

  /** Returns a callback that logs `<operation> completed` at debug level with `durationMs` */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

export function createLogger(config?: SeqLoggerConfig): SeqLogger {
  return new SeqLogger(config);
}
