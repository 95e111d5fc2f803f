/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > config.json > Defaults
 */

import { z } from 'zod';
import type { ResolvedValue, TodoConfig } from '../types/config.js';
import { readJson, saveJson } from '../store/json.js';
import { getConfigPath } from './paths.js';
import { TodoError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: TodoConfig = {
  output: {
    defaultFormat: 'human',
    showColor: true,
    showUnicode: true,
  },
  backup: {
    maxBackups: 5,
  },
  suggestions: {
    dueSoonDays: 3,
    upcomingDays: 7,
    staleCompletedDays: 7,
    duplicateThreshold: 1,
    fuzzyThreshold: 0.3,
    fuzzyLimit: 5,
    vagueMinLength: 10,
    vagueKeywords: ['stuff', 'things', 'misc', 'todo', 'remember', 'check', 'fix', 'update'],
  },
  logging: {
    level: 'info',
    filePath: 'logs/todo.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

export const TodoConfigSchema = z.object({
  output: z.object({
    defaultFormat: z.enum(['human', 'json']),
    showColor: z.boolean(),
    showUnicode: z.boolean(),
  }),
  backup: z.object({
    maxBackups: z.number().int().min(0),
  }),
  suggestions: z.object({
    dueSoonDays: z.number().int().min(0),
    upcomingDays: z.number().int().min(1),
    staleCompletedDays: z.number().int().min(0),
    duplicateThreshold: z.number().gt(0).max(1),
    fuzzyThreshold: z.number().min(0).max(1),
    fuzzyLimit: z.number().int().min(1),
    vagueMinLength: z.number().int().min(0),
    vagueKeywords: z.array(z.string().min(1)),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
}) satisfies z.ZodType<TodoConfig>;

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TODO_FORMAT': 'output.defaultFormat',
  'TODO_OUTPUT_SHOW_COLOR': 'output.showColor',
  'TODO_OUTPUT_SHOW_UNICODE': 'output.showUnicode',
  'TODO_MAX_BACKUPS': 'backup.maxBackups',
  'TODO_DUE_SOON_DAYS': 'suggestions.dueSoonDays',
  'TODO_UPCOMING_DAYS': 'suggestions.upcomingDays',
  'TODO_DUPLICATE_THRESHOLD': 'suggestions.duplicateThreshold',
  'TODO_LOG_LEVEL': 'logging.level',
  'TODO_LOG_FILE': 'logging.filePath',
};

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: ConfigRecord, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readConfigFile(): Promise<ConfigRecord | null> {
  const path = getConfigPath();
  const raw = await readJson(path);
  if (raw === null) return null;
  if (!isRecord(raw)) {
    throw new TodoError(ExitCode.CONFIG_ERROR, `Config file must hold a JSON object: ${path}`);
  }
  return raw;
}

/** The built-in defaults (a fresh copy). */
export function getDefaultConfig(): TodoConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < config.json < environment vars
 */
export async function loadConfig(): Promise<TodoConfig> {
  let merged: ConfigRecord = { ...structuredClone(DEFAULTS) };

  const fileConfig = await readConfigFile();
  if (fileConfig) {
    merged = deepMerge(merged, fileConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  const parsed = TodoConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new TodoError(ExitCode.CONFIG_ERROR, `Invalid configuration (${where})`, {
      fix: `Check ${getConfigPath()} and TODO_* environment variables`,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function assertKnownKey(path: string): void {
  if (getNestedValue({ ...structuredClone(DEFAULTS) }, path) === undefined) {
    throw new TodoError(ExitCode.CONFIG_ERROR, `Unknown config key: ${path}`, {
      fix: "Use 'todo config list' to see available keys",
    });
  }
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(path: string): Promise<ResolvedValue<unknown>> {
  assertKnownKey(path);
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const fileConfig = await readConfigFile();
  if (fileConfig) {
    const val = getNestedValue(fileConfig, path);
    if (val !== undefined) {
      return { value: val, source: 'file' };
    }
  }

  return { value: getNestedValue({ ...structuredClone(DEFAULTS) }, path), source: 'default' };
}

/**
 * Set a config value in config.json (dot-notation supported).
 * The resulting file must still describe a valid configuration.
 */
export async function setConfigValue(path: string, value: unknown): Promise<void> {
  assertKnownKey(path);
  const configPath = getConfigPath();
  const config = (await readConfigFile()) ?? {};
  setNestedValue(config, path, value);

  const check = TodoConfigSchema.safeParse(deepMerge({ ...structuredClone(DEFAULTS) }, config));
  if (!check.success) {
    throw new TodoError(ExitCode.VALIDATION_ERROR, `Invalid value for ${path}`, { cause: check.error });
  }
  await saveJson(configPath, config);
}
