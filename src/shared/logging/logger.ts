import { logBuffer } from '@/shared/logging/logBuffer';
import type { LogLevel } from '@/types/logLevel';

export type { LogLevel } from '@/types/logLevel';

const WEIGHTS: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export type LogContext = Record<string, unknown>;

/** One log call, before formatting. */
export interface LogRecord {
  time: Date;
  level: Exclude<LogLevel, 'none'>;
  scopes: readonly string[];
  message: string;
  context?: LogContext;
}

/**
 * Process-wide sink for every component logger. Levels and streams can be
 * changed at any time; existing loggers pick the change up on their next call.
 */
class LogManager {
  private threshold: LogLevel = 'info';
  private json = false;
  private stdout: NodeJS.WritableStream = process.stdout;
  private stderr: NodeJS.WritableStream = process.stderr;

  public configure(options: LoggerOptions): void {
    this.threshold = options.level ?? this.threshold;
    this.json = options.json ?? this.json;
    this.stdout = options.stdout ?? this.stdout;
    this.stderr = options.stderr ?? this.stderr;
  }

  public get level(): LogLevel {
    return this.threshold;
  }

  public enabled(level: LogLevel): boolean {
    return WEIGHTS[level] >= WEIGHTS[this.threshold];
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this, [component, ...scopes]);
  }

  public write(record: LogRecord): void {
    if (!this.enabled(record.level)) return;
    const line = this.json ? formatJson(record) : formatLine(record);
    const stream = record.level === 'warn' || record.level === 'error' ? this.stderr : this.stdout;
    stream.write(`${line}\n`);
    logBuffer.append(line);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}

/**
 * Logger bound to a scope path such as `Sync|Drift`.
 */
export class ComponentLogger {
  constructor(
    private readonly manager: LogManager,
    private readonly scopes: readonly string[],
  ) {}

  public spam(message: string, context?: LogContext): void {
    this.emit('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  /** Logger for a sub-scope, e.g. one player inside a component. */
  public child(...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.manager, [...this.scopes, ...scopes]);
  }

  public isEnabled(level: LogLevel): boolean {
    return this.manager.enabled(level);
  }

  private emit(level: LogRecord['level'], message: string, context?: LogContext): void {
    this.manager.write({ time: new Date(), level, scopes: this.scopes, message, context });
  }
}

export function formatLine(record: LogRecord): string {
  const scope = record.scopes.join('|');
  return `[${record.time.toISOString()}][${record.level.toUpperCase()}][${scope}]${formatContext(record.context)} ${record.message}`;
}

export function formatJson(record: LogRecord): string {
  return JSON.stringify({
    timestamp: record.time.toISOString(),
    level: record.level,
    scopes: record.scopes,
    message: record.message,
    context: record.context ?? {},
  });
}

function formatContext(context?: LogContext): string {
  if (!context) return '';
  const entries = Object.entries(context);
  if (entries.length === 0) return '';
  const pairs = entries
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, value]) => `${key}=${stringifyValue(value)}`);
  return ` [${pairs.join(' ')}]`;
}

function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (value instanceof Set || value instanceof Map) {
    return JSON.stringify(Array.from(value));
  }
  if (typeof value === 'string') {
    if (value.length === 0) return '""';
    // quote anything that would break key=value parsing
    return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable]';
    }
  }
  return String(value);
}
