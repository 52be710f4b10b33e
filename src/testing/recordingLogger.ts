import type { Logger } from '../logging/logger';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  scope: string;
  message: string;
  meta?: Record<string, unknown>;
}

/** Logger for tests: keeps every entry, children share the same list. */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly scope: string = 'test',
  ) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', scope: this.scope, message, meta });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', scope: this.scope, message, meta });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', scope: this.scope, message, meta });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', scope: this.scope, message, meta });
  }

  child(scope: string): Logger {
    return new RecordingLogger(this.entries, `${this.scope}:${scope}`);
  }

  messages(level?: LogEntry['level']): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}
