export { createLogger } from './logger';
export { loggerConfigFromEnv } from './env';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types';
