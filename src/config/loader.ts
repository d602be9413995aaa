/**
 * Configuration Loader
 *
 * Loads simulation settings from YAML with environment-specific overrides.
 * The loader returns a value; nothing in the library reads a global
 * configuration, so the caller passes the result to the facade.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ControlSystemError, formatZodIssues, invalidConfiguration } from '../api/errors.js';
import {
  SimulationConfigFileSchema,
  SimulationConfigSchema,
  type ConfigEnvironment,
  type ConfigLogLevel,
  type SimulationConfig,
} from '../types/schemas/config.js';
import type { RuntimeConfig } from './defaults.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
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

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'simulation.yaml');
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from a YAML file.
 *
 * The environment section (`production`, `development` or `test`;
 * default from NODE_ENV, falling back to development) is deep-merged
 * over the base sections and then dropped.
 *
 * @throws {ControlSystemError} InvalidConfiguration when the file is
 * missing, is not valid YAML, or fails schema validation
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): SimulationConfig {
  const finalPath = configPath ?? defaultConfigPath();

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      throw invalidConfiguration(`Configuration file not found: ${finalPath}`, { path: finalPath });
    }
    throw invalidConfiguration(
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
      { path: finalPath }
    );
  }

  const parsed = SimulationConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidConfiguration(
      `Configuration validation failed:\n${formatZodIssues(parsed.error).join('\n')}`,
      { path: finalPath }
    );
  }

  const { environments, ...base } = parsed.data;
  const override = environments?.[resolveEnvironment(environment)];
  return validateConfig(override ? deepMerge(base, override) : base);
}

/**
 * Validate configuration values
 *
 * @throws {ControlSystemError} InvalidConfiguration listing every issue as `path message`
 */
export function validateConfig(config: unknown): SimulationConfig {
  const parseResult = SimulationConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = formatZodIssues(parseResult.error);
    throw new ControlSystemError(
      'InvalidConfiguration',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { issues: errors }
    );
  }
  return parseResult.data;
}

/**
 * Settings the LoopSimulator facade accepts
 */
export interface SimulatorSettings {
  config: RuntimeConfig;
  logLevel: ConfigLogLevel;
}

/**
 * Convert YAML config (snake_case) to facade settings
 */
export function toSimulatorSettings(config: SimulationConfig): SimulatorSettings {
  return {
    config: {
      simulation: {
        T_END: config.simulation.t_end,
        SAMPLES: config.simulation.samples,
        STEP_AMPLITUDE: config.simulation.step_amplitude,
      },
      metrics: {
        REFERENCE: config.metrics.reference,
        SETTLING_TOLERANCE: config.metrics.settling_tolerance,
      },
      comparison: {
        T_END: config.comparison.t_end,
        SAMPLES: config.comparison.samples,
      },
    },
    logLevel: config.logging.level,
  };
}
