export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

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

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  /** Logger for the same category whose entries always carry `bindings`. */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * JSON-safe copy of a context object.
 * Errors become `{ name, message, stack }`, bigints become strings, and a repeated object reference
 * becomes `'[Circular]'`.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const serialized: unknown = JSON.parse(JSON.stringify(obj, replacer));
    return typeof serialized === 'object' && serialized !== null
      ? Object.fromEntries(Object.entries(serialized))
      : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(
    private readonly category: string,
    private readonly bindings: Record<string, unknown> = {}
  ) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new CategoryLogger(this.category, { ...this.bindings, ...bindings });
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (levelOrder[level] < levelOrder[globalConfig.level]) return;

    const msg = typeof msgOrObj === 'string' ? msgOrObj : (maybeMsg ?? '');
    const own = typeof msgOrObj === 'string' ? {} : msgOrObj;
    const merged = { ...this.bindings, ...own };

    const entry: LogEntry = {
      level,
      category: this.category,
      timestamp: new Date(),
      msg,
      ...(Object.keys(merged).length > 0 ? { context: serializeContext(merged) } : {}),
    };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

// Silent until initLogger installs sinks
let globalConfig: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
};

const loggerCache = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
