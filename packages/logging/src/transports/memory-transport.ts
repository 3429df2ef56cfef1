import { LogLevel, type LogEntry, type LogTransport } from '../types.js';

/**
 * Transport that keeps entries in memory, for tests and diagnostics
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly entries: LogEntry[] = [];

  constructor(private readonly capacity = 1000) {}

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  getMessages(): string[] {
    return this.entries.map(e => `${LogLevel[e.level]} ${e.message}`);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
