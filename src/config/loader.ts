/**
 * Configuration loader for the scan-profiler server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, LogLevel, ScanConfig, ServerSettings } from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Whether to validate config (default: true) */
  validate?: boolean;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

/**
 * Deep merge two objects (source overrides target).
 */
function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      targetValue !== undefined &&
      targetValue !== null &&
      typeof targetValue === 'object' &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(targetValue, sourceValue as Partial<typeof targetValue>);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is Partial<ServerSettings> {
  if (!config || typeof config !== 'object') {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config as Record<string, unknown>;

  if (c.port !== undefined && (typeof c.port !== 'number' || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !isLogLevel(c.logLevel)) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, c.logLevel);
  }

  if (c.bodyLimit !== undefined && !isPositiveInteger(c.bodyLimit)) {
    throw new ConfigValidationError('bodyLimit must be a positive integer (bytes)', `${path}.bodyLimit`, c.bodyLimit);
  }

  if (c.cors !== undefined) {
    if (!c.cors || typeof c.cors !== 'object') {
      throw new ConfigValidationError('must be an object', `${path}.cors`, c.cors);
    }
    const cors = c.cors as Record<string, unknown>;
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    if (
      cors.origins !== undefined &&
      (!Array.isArray(cors.origins) || cors.origins.some((origin) => typeof origin !== 'string'))
    ) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.cors.origins`, cors.origins);
    }
  }
}

/**
 * Validate scan processing configuration.
 */
function validateScanConfig(config: unknown, path = 'scans'): asserts config is Partial<ScanConfig> {
  if (!config || typeof config !== 'object') {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config as Record<string, unknown>;

  if (c.markerPolicy !== undefined && c.markerPolicy !== 'discard' && c.markerPolicy !== 'require') {
    throw new ConfigValidationError('markerPolicy must be one of: discard, require', `${path}.markerPolicy`, c.markerPolicy);
  }

  if (c.raggedPolicy !== undefined && c.raggedPolicy !== 'reject' && c.raggedPolicy !== 'pad') {
    throw new ConfigValidationError('raggedPolicy must be one of: reject, pad', `${path}.raggedPolicy`, c.raggedPolicy);
  }

  if (
    c.previewRows !== undefined &&
    (typeof c.previewRows !== 'number' || !Number.isInteger(c.previewRows) || c.previewRows < 0)
  ) {
    throw new ConfigValidationError('previewRows must be a non-negative integer', `${path}.previewRows`, c.previewRows);
  }

  if (c.maxFiles !== undefined && !isPositiveInteger(c.maxFiles)) {
    throw new ConfigValidationError('maxFiles must be a positive integer', `${path}.maxFiles`, c.maxFiles);
  }

  if (c.tempDir !== undefined && (typeof c.tempDir !== 'string' || c.tempDir.length === 0)) {
    throw new ConfigValidationError('tempDir must be a non-empty string', `${path}.tempDir`, c.tempDir);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is Partial<AppConfig> {
  if (!config || typeof config !== 'object') {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const c = config as Record<string, unknown>;

  if (c.server !== undefined) {
    validateServerConfig(c.server);
  }

  if (c.scans !== undefined) {
    validateScanConfig(c.scans);
  }
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content) ?? {};
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Substitute environment variables
  const substituted = substituteEnvVarsRecursive(parsed);

  // Validate if requested
  if (options.validate !== false) {
    validateConfig(substituted);
  }

  // Merge with defaults
  const partialConfig = substituted as Partial<AppConfig>;
  return {
    server: deepMerge(DEFAULT_CONFIG.server, partialConfig.server ?? {}),
    scans: deepMerge(DEFAULT_CONFIG.scans, partialConfig.scans ?? {}),
  };
}
