export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

type LogMethod = {
  (msg: string): void;
  (obj: Record<string, unknown>, msg: string): void;
};

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** Whether an entry at `level` would reach the sinks */
  isLevelEnabled(level: LogLevel): boolean;
  /**
   * Returns a logger for the same category whose entries always carry `bindings`.
   * Context passed at the call site wins over bound keys of the same name.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  /** Per-category thresholds, e.g. `{ HttpClient: 'debug' }` */
  categoryLevels?: Record<string, LogLevel> | undefined;
  sinks?: Sink[] | undefined;
}

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

/**
 * Make a context object JSON-safe.
 * Errors become {name, message, stack}, bigints become strings and repeated
 * object references are replaced with '[Circular]'.
 */
export function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value !== 'object' || value === null) {
      return value;
    }
    if (seen.has(value)) {
      return '[Circular]';
    }
    seen.add(value);
    return value;
  };

  try {
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

interface ActiveConfig {
  level: LogLevel;
  categoryLevels: Readonly<Record<string, LogLevel>>;
  sinks: readonly Sink[];
}

let active: ActiveConfig = { level: 'info', categoryLevels: {}, sinks: [] };

function thresholdFor(category: string): LogLevel {
  return active.categoryLevels[category] ?? active.level;
}

class CategoryLogger implements Logger {
  readonly trace: LogMethod = (msgOrObj: string | Record<string, unknown>, maybeMsg?: string) =>
    this.emit('trace', msgOrObj, maybeMsg);
  readonly debug: LogMethod = (msgOrObj: string | Record<string, unknown>, maybeMsg?: string) =>
    this.emit('debug', msgOrObj, maybeMsg);
  readonly info: LogMethod = (msgOrObj: string | Record<string, unknown>, maybeMsg?: string) =>
    this.emit('info', msgOrObj, maybeMsg);
  readonly warn: LogMethod = (msgOrObj: string | Record<string, unknown>, maybeMsg?: string) =>
    this.emit('warn', msgOrObj, maybeMsg);
  readonly error: LogMethod = (msgOrObj: string | Record<string, unknown>, maybeMsg?: string) =>
    this.emit('error', msgOrObj, maybeMsg);

  constructor(
    private readonly category: string,
    private readonly bindings: Readonly<Record<string, unknown>> = {}
  ) {}

  isLevelEnabled(level: LogLevel): boolean {
    return active.sinks.length > 0 && LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[thresholdFor(this.category)];
  }

  child(bindings: Record<string, unknown>): Logger {
    return new CategoryLogger(this.category, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (!this.isLevelEnabled(level)) return;

    const msg = typeof msgOrObj === 'string' ? msgOrObj : (maybeMsg ?? '');
    const merged = typeof msgOrObj === 'string' ? { ...this.bindings } : { ...this.bindings, ...msgOrObj };

    const entry: LogEntry = {
      level,
      category: this.category,
      timestamp: new Date(),
      msg,
      ...(Object.keys(merged).length > 0 ? { context: serializeContext(merged) } : {}),
    };

    for (const sink of active.sinks) {
      sink.write(entry);
    }
  }
}

const loggers = new Map<string, Logger>();

/**
 * Replace the global configuration. Loggers obtained earlier pick it up on
 * their next call.
 */
export function initLogger(config: LoggerConfig): void {
  active = {
    level: config.level ?? 'info',
    categoryLevels: { ...config.categoryLevels },
    sinks: [...(config.sinks ?? [])],
  };
}

export function getLogger(category: string): Logger {
  let logger = loggers.get(category);
  if (!logger) {
    logger = new CategoryLogger(category);
    loggers.set(category, logger);
  }
  return logger;
}

export function flushLoggers(): void {
  for (const sink of active.sinks) {
    sink.flush();
  }
}
