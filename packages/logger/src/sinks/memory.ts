import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps every entry in memory. Useful in tests and for attaching recent
 * log lines to diagnostics.
 */
export class MemorySink implements Sink {
  private readonly entries: LogEntry[] = [];

  constructor(private readonly limit = Number.POSITIVE_INFINITY) {}

  write(entry: LogEntry): void {
    if (this.entries.length >= this.limit) {
      this.entries.shift();
    }
    this.entries.push(entry);
  }

  flush(): void {}

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level ? this.entries.filter((entry) => entry.level === level) : [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
