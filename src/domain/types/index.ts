// JSON value types
export {
  JsonValueSchema,
  StoreDataSchema,
  cloneJsonValue,
  type JsonPrimitive,
  type JsonValue,
  type StoreData,
  type ToJSON,
  type Encodable,
} from './json.js';

// Configuration
export {
  LogLevelSchema,
  LocalKvConfigSchema,
  StoreNameSchema,
  type LocalKvConfig,
  type LocalKvConfigInput,
} from './config.js';
