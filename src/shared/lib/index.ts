export { logger, setLoggerOptions } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogData } from './logger.js';
export {
  LocalKvError,
  ValidationError,
  StoreError,
  LoadError,
  IOError,
  SerializationError,
  StoreDisposedError,
  describeError,
} from './errors.js';
export { ok, err, tryCatch, tryCatchSync, unwrap } from './result.js';
export type { Result } from './result.js';
