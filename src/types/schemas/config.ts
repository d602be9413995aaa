/**
 * Simulation Configuration Schemas
 *
 * Zod schemas for validating simulation.yaml. Keys are snake_case as
 * written in the file; the loader maps them onto the facade settings.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { FiniteNumber, OpenFraction, PositiveInteger, PositiveNumber } from './common.js';

/**
 * Closed-loop horizon
 */
export const SimulationSectionSchema = z.object({
  t_end: PositiveNumber,
  samples: PositiveInteger.min(2, 'must be >= 2'),
  step_amplitude: FiniteNumber,
});

/**
 * Step-response metric settings
 */
export const MetricsSectionSchema = z.object({
  reference: FiniteNumber,
  settling_tolerance: OpenFraction,
});

/**
 * Controller comparison horizon
 */
export const ComparisonSectionSchema = z.object({
  t_end: PositiveNumber,
  samples: PositiveInteger.min(2, 'must be >= 2'),
});

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], {
  errorMap: () => ({ message: 'Level must be one of: fatal, error, warn, info, debug, trace, silent' }),
});

export const LoggingSectionSchema = z.object({
  level: LogLevelSchema,
});

const SimulationConfigSchemaBase = z.object({
  simulation: SimulationSectionSchema,
  metrics: MetricsSectionSchema,
  comparison: ComparisonSectionSchema,
  logging: LoggingSectionSchema,
});

/**
 * Per-environment override: any subset of any section
 */
export const EnvironmentOverrideSchema = z.object({
  simulation: SimulationSectionSchema.partial().optional(),
  metrics: MetricsSectionSchema.partial().optional(),
  comparison: ComparisonSectionSchema.partial().optional(),
  logging: LoggingSectionSchema.partial().optional(),
});

/**
 * Resolved configuration (environment overrides applied)
 */
export const SimulationConfigSchema = SimulationConfigSchemaBase.strict();

/**
 * Configuration file as written, with optional environment sections
 */
export const SimulationConfigFileSchema = SimulationConfigSchemaBase.extend({
  environments: z
    .object({
      production: EnvironmentOverrideSchema.optional(),
      development: EnvironmentOverrideSchema.optional(),
      test: EnvironmentOverrideSchema.optional(),
    })
    .optional(),
});

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigFile = z.infer<typeof SimulationConfigFileSchema>;
export type EnvironmentOverride = z.infer<typeof EnvironmentOverrideSchema>;
export type ConfigEnvironment = keyof NonNullable<SimulationConfigFile['environments']>;
export type ConfigLogLevel = z.infer<typeof LogLevelSchema>;
