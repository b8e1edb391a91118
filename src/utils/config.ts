/**
 * Configuration loading and management for pricesheet
 *
 * Sources, later wins:
 * 1. built-in defaults
 * 2. JSON file (./pricesheet.json, or PRICESHEET_CONFIG_PATH)
 * 3. PRICESHEET_* environment variables (the CLI loads .env before this runs)
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_LAYOUT, MAX_ROWS } from '../types';
import type { Config } from '../types';
import { ConfigError } from '../errors';
import { createLogger } from './logger';

const logger = createLogger('config');

export function resolveConfigPath(env = process.env): string {
  const override = env.PRICESHEET_CONFIG_PATH?.trim();
  if (override) return resolve(override);
  return resolve('pricesheet.json');
}

const DEFAULT_CONFIG = {
  sheet: {
    url: '',
    fetchTimeoutMs: 15_000,
    cacheTtlMs: 30 * 60 * 1000,
    attempts: 1,
  },
  template: {
    path: 'templates/price_update_template.xlsx',
    layout: DEFAULT_LAYOUT,
  },
  table: {
    defaultRows: 10,
    maxRows: MAX_ROWS,
  },
  validation: {
    unpublishedPolicy: 'warn-require-confirm',
  },
  output: {
    filenamePrefix: 'price_update',
    dir: '.',
  },
} satisfies Config;

const columnLetter = z.string().regex(/^[A-Z]{1,3}$/, 'must be a column letter such as "D"');

const configSchema = z.object({
  sheet: z.object({
    url: z.string(),
    fetchTimeoutMs: z.coerce.number().int().positive(),
    cacheTtlMs: z.coerce.number().int().nonnegative(),
    attempts: z.coerce.number().int().min(1).max(5),
  }),
  template: z.object({
    path: z.string().min(1),
    layout: z.object({
      startRow: z.coerce.number().int().min(1),
      skuColumn: columnLetter,
      priceColumns: z.array(columnLetter).min(1),
    }),
  }),
  table: z.object({
    defaultRows: z.coerce.number().int().min(1).max(MAX_ROWS),
    maxRows: z.coerce.number().int().min(1).max(MAX_ROWS),
  }),
  validation: z.object({
    unpublishedPolicy: z.enum(['ignore', 'warn-require-confirm']),
  }),
  output: z.object({
    filenamePrefix: z.string().min(1),
    dir: z.string().min(1),
  }),
});

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
      return env[varName] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const sheet: Record<string, unknown> = {};
  if (env.PRICESHEET_SHEET_URL) sheet.url = env.PRICESHEET_SHEET_URL;
  if (env.PRICESHEET_FETCH_TIMEOUT_MS) sheet.fetchTimeoutMs = env.PRICESHEET_FETCH_TIMEOUT_MS;
  if (env.PRICESHEET_CACHE_TTL_MS) sheet.cacheTtlMs = env.PRICESHEET_CACHE_TTL_MS;

  const overrides: Record<string, unknown> = { sheet };
  if (env.PRICESHEET_TEMPLATE_PATH) overrides.template = { path: env.PRICESHEET_TEMPLATE_PATH };
  if (env.PRICESHEET_UNPUBLISHED_POLICY) {
    overrides.validation = { unpublishedPolicy: env.PRICESHEET_UNPUBLISHED_POLICY };
  }
  if (env.PRICESHEET_OUTPUT_DIR) overrides.output = { dir: env.PRICESHEET_OUTPUT_DIR };
  return overrides;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    logger.error({ configPath, error: err }, 'Failed to parse config file');
    throw new ConfigError(`Failed to parse config file ${configPath}`, err);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from file and environment
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? resolveConfigPath(env);

  const fileConfig = substituteEnvVars(readConfigFile(configPath), env);
  const fromFile = isPlainObject(fileConfig) ? fileConfig : {};
  const merged = deepMerge(deepMerge({ ...DEFAULT_CONFIG }, fromFile), envOverrides(env));

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.error({ configPath, issues }, 'Invalid configuration');
    throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
  }

  const config = result.data;
  if (config.table.defaultRows > config.table.maxRows) {
    throw new ConfigError(
      `table.defaultRows (${config.table.defaultRows}) exceeds table.maxRows (${config.table.maxRows})`,
    );
  }
  logger.debug({ configPath, policy: config.validation.unpublishedPolicy }, 'Configuration loaded');
  return config;
}

export function getDefaultConfig(): Config {
  return structuredClone(DEFAULT_CONFIG);
}
