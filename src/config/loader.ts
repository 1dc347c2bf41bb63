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

/**
 * Validated runtime configuration (matches runtime.yaml structure)
 */
export type Config = RuntimeConfig;

export type ConfigEnvironment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; arrays and scalars from source replace target
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
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

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Load configuration from YAML file, apply the environment override block
 * and validate the result.
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  const defaultConfigPath = join(findPackageRoot(), 'config', 'runtime.yaml');
  const finalPath = configPath ?? defaultConfigPath;

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`
      );
    }
    throw new Error(`Failed to load configuration: ${String(error)}`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to load configuration: ${finalPath} does not contain a mapping`);
  }

  const { environments, ...baseConfig } = parsed;
  let finalConfig: PlainObject = baseConfig;

  if (isPlainObject(environments)) {
    const envConfig = environments[resolveEnvironment(environment)];
    if (isPlainObject(envConfig)) {
      finalConfig = deepMerge(baseConfig, envConfig);
    }
  }

  return validateConfig(finalConfig);
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
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
