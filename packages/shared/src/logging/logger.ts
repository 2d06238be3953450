/**
 * Structured logger for the controller, scoped per component and per reconcile pass
 * @module @rbac-sync/shared/logging/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

/**
 * Context attached to every entry of a logger and its children
 */
export interface LogMeta {
  service?: string;
  /** Controller part writing the entry (work-queue, admission-webhook, ...) */
  component?: string;
  /** RBACRule a reconcile pass is working on */
  rule?: string;
  /** Identifies one reconcile pass, so interleaved passes can be told apart */
  passId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;
  service?: string;
  component?: string;
  /** One coloured line per entry instead of JSON */
  pretty?: boolean;
  /** Replaces the console writer */
  output?: (entry: LogEntry) => void;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';

export class Logger {
  private readonly config: LoggerConfig;
  private readonly meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { level: 'info', pretty: false, ...config };
    this.meta = {
      ...meta,
      service: config.service ?? meta.service,
      component: config.component ?? meta.component,
    };
  }

  /**
   * Logger that adds `meta` to everything it writes
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Logger for one reconcile pass of a rule, tagged with a fresh pass ID
   */
  forPass(rule: string): Logger {
    return this.child({ rule, passId: newPassId() });
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.write('error', message, meta, error);
    } else {
      this.write('error', message, error);
    }
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.write('fatal', message, meta, error);
    } else {
      this.write('fatal', message, error);
    }
  }

  private write(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.config.level]) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    const merged = dropUndefined({ ...this.meta, ...meta });
    if (Object.keys(merged).length > 0) {
      entry.meta = merged;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
      if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
        entry.error.code = error.code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
      return;
    }
    const line = this.config.pretty ? formatPretty(entry) : JSON.stringify(entry);
    if (level === 'error' || level === 'fatal') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.info(line);
    }
  }
}

/**
 * `2026-03-01T12:00:00.000Z INFO  Applied bindings (rbacrule-reconciler) rule=team-access pass=lx3k-9f2a`
 */
export function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  let line = `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} ${entry.message}`;

  const meta = entry.meta;
  if (meta?.component) {
    line += ` ${color}(${meta.component})${RESET}`;
  }
  if (meta?.rule) {
    line += ` rule=${meta.rule}`;
  }
  if (meta?.passId) {
    line += ` pass=${meta.passId}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\n${entry.error.stack}`;
    }
  }
  return line;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return Object.keys(LOG_LEVEL_VALUES).some((level) => level === value);
}

/**
 * Logger without environment handling, for callers that pick their own output
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Logger for a controller component. Under a test runner it writes nothing
 * unless LOG_LEVEL is set; on a terminal it prints pretty lines.
 */
export function createServiceLogger(config: Partial<LoggerConfig> = {}, meta?: LogMeta): Logger {
  if (runningUnderTests() && !process.env.LOG_LEVEL) {
    return new Logger({ ...config, level: 'fatal', output: () => undefined }, meta);
  }
  return new Logger({ pretty: process.stdout.isTTY === true, ...config }, meta);
}

function runningUnderTests(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

function newPassId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).substring(2, 10)}`;
}

function dropUndefined(meta: LogMeta): LogMeta {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
