/**
 * @fileoverview Confidence Runtime Configuration
 *
 * Resolves the defaults used by the confidence model when a caller does not
 * pass them explicitly.
 *
 * Priority order (highest to lowest):
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Built-in defaults
 *
 * @packageDocumentation
 */

import { logWarning } from '../telemetry/logger.js';

/**
 * Elementwise strategies for combining several confidence values.
 */
export type AggregationMethod = 'arithmetic' | 'geometric' | 'minimum' | 'maximum';

export const AGGREGATION_METHODS: readonly AggregationMethod[] = [
  'arithmetic',
  'geometric',
  'minimum',
  'maximum',
];

export function isAggregationMethod(value: unknown): value is AggregationMethod {
  return typeof value === 'string' && AGGREGATION_METHODS.some((method) => method === value);
}

/** Identifier of the schema a confidence value conforms to unless told otherwise. */
export const DEFAULT_CONFIDENCE_SCHEMA = 'v1.confidence.core';

export interface ConfidenceConfig {
  /** Strategy used by aggregateConfidence when no method is given */
  defaultAggregation: AggregationMethod;
}

export const DEFAULT_CONFIDENCE_CONFIG: ConfidenceConfig = {
  defaultAggregation: 'arithmetic',
};

export const CONFIDENCE_ENV_VARS = {
  DEFAULT_AGGREGATION: 'CONFIDENCE_DEFAULT_AGGREGATION',
} as const;

/**
 * Read configuration from environment variables.
 * Unrecognised values are ignored with a warning.
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<ConfidenceConfig> {
  const config: Partial<ConfidenceConfig> = {};

  const rawAggregation = env[CONFIDENCE_ENV_VARS.DEFAULT_AGGREGATION];
  if (rawAggregation !== undefined && rawAggregation.trim().length > 0) {
    const normalized = rawAggregation.trim().toLowerCase();
    if (isAggregationMethod(normalized)) {
      config.defaultAggregation = normalized;
    } else {
      logWarning('[confidence] Ignoring unknown aggregation method from environment', {
        variable: CONFIDENCE_ENV_VARS.DEFAULT_AGGREGATION,
        value: rawAggregation,
      });
    }
  }

  return config;
}

export function resolveConfidenceConfig(
  overrides: Partial<ConfidenceConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ConfidenceConfig {
  return {
    ...DEFAULT_CONFIDENCE_CONFIG,
    ...getEnvConfig(env),
    ...definedOnly(overrides),
  };
}

function definedOnly(overrides: Partial<ConfidenceConfig>): Partial<ConfidenceConfig> {
  const result: Partial<ConfidenceConfig> = {};
  if (overrides.defaultAggregation !== undefined) {
    result.defaultAggregation = overrides.defaultAggregation;
  }
  return result;
}
