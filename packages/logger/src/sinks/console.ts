import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean;
}

const ANSI: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

/**
 * Writes each entry as soon as it is logged, one line per entry:
 * `[HH:MM:SS] LEVEL [category] message {key=value, ...}`
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    const line = formatLine(entry, this.color);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  flush(): void {
    // nothing held back
  }
}

export function formatLine(entry: LogEntry, color = false): string {
  const time = formatTime(entry.timestamp);
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${ANSI[entry.level]}${label}${RESET}` : label;
  const context = entry.context ? ` ${formatContext(entry.context)}` : '';

  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
