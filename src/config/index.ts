/**
 * Configuration loading and validation
 *
 * Sources, highest precedence first:
 * 1. Runtime overrides (the CLI --data flag)
 * 2. TIMEKEEP_* environment variables
 * 3. Settings file at TIMEKEEP_CONFIG_PATH or ~/.config/timekeep/config.yaml
 * 4. Built-in defaults
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import type { TimekeepConfig } from '../types/index.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Environment variable schema
const envSchema = z.object({
  TIMEKEEP_DATA: z.string().min(1).optional(),
  TIMEKEEP_CONFIG_PATH: z.string().min(1).optional(),
  TIMEKEEP_LOG_LEVEL: logLevelSchema.optional(),
  TIMEKEEP_VOICE_COMMAND: z.string().min(1).optional(),
  TIMEKEEP_VOICE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TIMEKEEP_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

// Settings file schema
const fileConfigSchema = z.object({
  data_path: z.string().min(1).optional(),
  log_level: logLevelSchema.optional(),
  voice: z
    .object({
      command: z.string().min(1).optional(),
      timeout_ms: z.number().int().positive().default(15000),
    })
    .default({}),
  lock: z
    .object({
      timeout_ms: z.number().int().positive().default(5000),
      stale_ms: z.number().int().positive().default(30000),
    })
    .default({}),
  suggestions: z
    .object({
      daily_min_minutes: z.number().nonnegative().default(60),
      daily_max_minutes: z.number().positive().default(600),
      dominant_share: z.number().gt(0).lte(1).default(0.6),
    })
    .default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ConfigOverrides {
  dataPath?: string | undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

export function getDefaultDataPath(): string {
  return join(homedir(), '.timekeep', 'data.json');
}

export function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'timekeep', 'config.yaml');
}

/**
 * Read and validate the settings file; a missing file yields the defaults
 */
export function loadFileConfig(configPath: string): FileConfig {
  if (!existsSync(configPath)) {
    return fileConfigSchema.parse({});
  }

  const content = readFileSync(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new Error(
      `Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid config file ${configPath}:\n${formatIssues(result.error)}`);
  }

  logger.debug(`Loaded settings from ${configPath}`);
  return result.data;
}

/**
 * Build the runtime configuration from all sources
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): TimekeepConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Configuration error:\n${formatIssues(result.error)}`);
  }
  const vars = result.data;

  const configPath = resolve(vars.TIMEKEEP_CONFIG_PATH ?? getDefaultConfigPath());
  const file = loadFileConfig(configPath);

  const dataPath = overrides.dataPath ?? vars.TIMEKEEP_DATA ?? file.data_path ?? getDefaultDataPath();

  return {
    dataPath: resolve(dataPath),
    configPath,
    logLevel: vars.TIMEKEEP_LOG_LEVEL ?? file.log_level ?? 'warn',
    voice: {
      command: vars.TIMEKEEP_VOICE_COMMAND ?? file.voice.command,
      timeoutMs: vars.TIMEKEEP_VOICE_TIMEOUT_MS ?? file.voice.timeout_ms,
    },
    lock: {
      timeoutMs: vars.TIMEKEEP_LOCK_TIMEOUT_MS ?? file.lock.timeout_ms,
      staleMs: file.lock.stale_ms,
    },
    suggestions: file.suggestions,
  };
}

// Singleton config instance
let configInstance: TimekeepConfig | null = null;
let pendingOverrides: ConfigOverrides = {};

/**
 * Get the current config (cached)
 */
export function getConfig(): TimekeepConfig {
  if (!configInstance) {
    configInstance = loadConfig(pendingOverrides);
  }
  return configInstance;
}

/**
 * Apply runtime overrides; takes effect on the next getConfig()
 */
export function configure(overrides: ConfigOverrides): void {
  pendingOverrides = { ...overrides };
  configInstance = null;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  pendingOverrides = {};
  configInstance = null;
}

// Export schemas for testing
export const schemas = {
  env: envSchema,
  file: fileConfigSchema,
};
