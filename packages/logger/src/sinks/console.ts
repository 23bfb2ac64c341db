import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Writes one line per entry.
 *
 * Format: 2024-01-01T00:00:00.000Z LEVEL [category] message key=value ...
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    const line = formatEntry(entry, this.color);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  // Entries are written synchronously
  flush(): void {}
}

export function formatEntry(entry: LogEntry, color = false): string {
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${LEVEL_COLORS[entry.level]}${label}\x1b[0m` : label;
  const context = entry.context ? formatContext(entry.context) : '';

  return `${entry.timestamp.toISOString()} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatContext(context: Record<string, unknown>): string {
  return Object.entries(context)
    .map(([key, value]) => ` ${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join('');
}
