import type { LogEntry, Sink } from '../logger.js';

/**
 * Keeps every entry in memory, unbuffered. Useful for asserting on what a solver logged.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // entries are kept as written
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
