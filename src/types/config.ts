/**
 * Configuration type definitions.
 * Values cascade: defaults < config.json < environment variables.
 */

/** Output format options. */
export type OutputFormat = 'human' | 'json';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showColor: boolean;
  showUnicode: boolean;
}

/** Backup configuration. */
export interface BackupConfig {
  /** Numbered backups of tasks.json to keep. 0 disables backups. */
  maxBackups: number;
}

/** Tuning for the query and suggestion engine. */
export interface SuggestionConfig {
  /** Days ahead (excluding today) that count as "due soon". */
  dueSoonDays: number;
  /** Days ahead that count as an upcoming deadline. */
  upcomingDays: number;
  /** Completed tasks older than this many days are archive-ready. */
  staleCompletedDays: number;
  /** Similarity (0..1) at which two pending tasks are duplicates. */
  duplicateThreshold: number;
  /** Matches must score strictly above this to be offered for deletion. */
  fuzzyThreshold: number;
  fuzzyLimit: number;
  vagueMinLength: number;
  vagueKeywords: string[];
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/todo.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Resolved configuration. */
export interface TodoConfig {
  output: OutputConfig;
  backup: BackupConfig;
  suggestions: SuggestionConfig;
  logging: LoggingConfig;
}

/** Where a resolved value came from. */
export type ConfigSource = 'env' | 'file' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
