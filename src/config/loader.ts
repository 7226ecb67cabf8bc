/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { InferenceError } from '../api/errors.js';
import type { TailMode } from '../types/inference.js';
import { RuntimeConfigSchema } from '../types/schemas/config.js';
import { INFERENCE, LOGGING, PLOT } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Configuration Schema (matches runtime.yaml structure)
 */
export interface Config {
  inference: {
    large_sample_threshold: number;
    default_alpha: number;
    default_confidence: number;
    default_tail: TailMode;
  };
  plot: {
    sample_size_curve_points: number;
  };
  logging: {
    level: LogLevelName;
    name: string;
  };
}

/**
 * camelCase view of the inference section used by the engine
 */
export interface InferenceDefaults {
  largeSampleThreshold: number;
  alpha: number;
  confidenceLevel: number;
  tail: TailMode;
  maxCurvePoints: number;
}

const PartialConfigSchema = RuntimeConfigSchema.deepPartial();

const ConfigFileSchema = PartialConfigSchema.extend({
  environments: z
    .object({
      production: PartialConfigSchema.optional(),
      development: PartialConfigSchema.optional(),
      test: PartialConfigSchema.optional(),
    })
    .optional(),
});

/**
 * Built-in configuration, identical to the shipped runtime.yaml base section
 */
export const DEFAULT_CONFIG: Config = {
  inference: {
    large_sample_threshold: INFERENCE.LARGE_SAMPLE_THRESHOLD,
    default_alpha: INFERENCE.DEFAULT_ALPHA,
    default_confidence: INFERENCE.DEFAULT_CONFIDENCE,
    default_tail: INFERENCE.DEFAULT_TAIL,
  },
  plot: {
    sample_size_curve_points: PLOT.SAMPLE_SIZE_CURVE_POINTS,
  },
  logging: {
    level: LOGGING.DEFAULT_LEVEL,
    name: LOGGING.DEFAULT_NAME,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; `undefined` in the source keeps the target value
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

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
 * Load configuration from YAML file
 *
 * Missing keys fall back to DEFAULT_CONFIG. The result is not validated;
 * see validateConfig().
 */
export function loadConfig(configPath?: string, environment?: Environment): Record<string, unknown> {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new InferenceError('ConfigError', `Configuration file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    throw new InferenceError('ConfigError', `Failed to read configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fileContents) ?? {};
  } catch (error) {
    throw new InferenceError('ConfigError', `Failed to parse configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  const fileResult = ConfigFileSchema.safeParse(parsed);
  if (!fileResult.success) {
    throw configValidationError(fileResult.error);
  }

  const { environments, ...base } = fileResult.data;
  let finalConfig = deepMerge({ ...DEFAULT_CONFIG }, base);

  const envConfig = environments?.[resolveEnvironment(environment)];
  if (envConfig) {
    finalConfig = deepMerge(finalConfig, envConfig);
  }

  const levelOverride = process.env.INFERENCE_LOG_LEVEL;
  if (levelOverride) {
    finalConfig = deepMerge(finalConfig, { logging: { level: levelOverride.toLowerCase() } });
  }

  return finalConfig;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw configValidationError(parseResult.error);
  }
  return parseResult.data;
}

function configValidationError(error: z.ZodError): InferenceError {
  const errors = error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });

  return new InferenceError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`, {
    issues: errors,
  });
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = validateConfig(loadConfig(configPath, environment));
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

/**
 * Convert YAML config (snake_case) to the engine's InferenceDefaults
 */
export function getInferenceDefaults(config: Config = getConfig()): InferenceDefaults {
  return {
    largeSampleThreshold: config.inference.large_sample_threshold,
    alpha: config.inference.default_alpha,
    confidenceLevel: config.inference.default_confidence,
    tail: config.inference.default_tail,
    maxCurvePoints: config.plot.sample_size_curve_points,
  };
}
