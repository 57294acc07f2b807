/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import { ConfigurationError, errnoCode } from '../utils/errors.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace those in `target`
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) {
    return environment;
  }
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Validate a raw configuration object
 *
 * @throws {ConfigurationError} listing every failing field
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
  }
  return parseResult.data;
}

/**
 * Load configuration from YAML file
 *
 * @param configPath - Defaults to config/runtime.yaml in the package root
 * @param environment - Defaults to NODE_ENV (anything unrecognised is 'development')
 */
export function loadConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  const finalPath = configPath || join(findPackageRoot(), 'config', 'runtime.yaml');

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${finalPath}`);
    }
    throw new ConfigurationError(
      `Failed to load configuration: ${finalPath}`,
      [],
      error instanceof Error ? error : undefined
    );
  }

  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Configuration file is not a mapping: ${finalPath}`);
  }

  const { environments, ...base } = raw;
  let merged: PlainObject = base;
  if (isPlainObject(environments)) {
    const override = environments[resolveEnvironment(environment)];
    if (isPlainObject(override)) {
      merged = deepMerge(base, override);
    }
  }

  return validateConfig(merged);
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration, loading the default file on first use
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}
