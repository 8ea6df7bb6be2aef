import { EventEmitter } from 'node:events';

export interface LogEntry {
  line: string;
  timestamp: string;
}

type LogListener = (entry: LogEntry) => void;

/**
 * Rolling in-memory copy of the most recent log lines.
 */
class LogBuffer extends EventEmitter {
  private entries: LogEntry[] = [];
  private readonly limit = 2000;

  public append(rawLine: string): void {
    if (!rawLine) return;
    const entry: LogEntry = {
      line: rawLine.replace(/\r\n/g, '\n'),
      timestamp: new Date().toISOString(),
    };
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    this.emit('entry', entry);
  }

  public lines(): string[] {
    return this.entries.map((entry) => entry.line);
  }

  public clear(): void {
    this.entries = [];
  }

  public subscribe(listener: LogListener): () => void {
    this.on('entry', listener);
    return () => this.off('entry', listener);
  }
}

export const logBuffer = new LogBuffer();
