export {
  initLogger,
  getLogger,
  flushLoggers,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, formatLine, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
export { initLoggerFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
