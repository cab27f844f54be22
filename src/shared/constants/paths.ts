export const LOCALKV_DIRS = {
  root: '.localkv',
  stores: 'stores',
  config: 'config.json',
} as const;

export const STORE_FILE_EXTENSION = '.json';

export const LOCALKV_ENV = {
  home: 'LOCALKV_HOME',
  directory: 'LOCALKV_DIR',
  flushDelayMs: 'LOCALKV_FLUSH_DELAY_MS',
  indent: 'LOCALKV_INDENT',
  logLevel: 'LOCALKV_LOG_LEVEL',
  logJson: 'LOCALKV_LOG_JSON',
} as const;
