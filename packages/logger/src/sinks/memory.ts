import type { LogEntry, Sink } from '../logger.js';

/**
 * Keeps entries in an array. Used by tests and by callers that want to
 * inspect what the library reported.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    return;
  }
}
