/**
 * @fileoverview Epistemics Module - Dimensional Confidence and Schema Registry
 *
 * This module provides:
 * - Dimensional confidence values with range invariants and immutable transforms
 * - Aggregation of several confidence values under a chosen strategy
 * - Named dimension schemas with inheritance and single-pass validation
 *
 * @packageDocumentation
 */

// Configuration
export {
  AGGREGATION_METHODS,
  CONFIDENCE_ENV_VARS,
  DEFAULT_CONFIDENCE_CONFIG,
  DEFAULT_CONFIDENCE_SCHEMA,
  getEnvConfig,
  isAggregationMethod,
  resolveConfidenceConfig,
  type AggregationMethod,
  type ConfidenceConfig,
} from './confidence_config.js';

// Confidence values
export {
  CANONICAL_DIMENSIONS,
  CONFIDENCE_LABEL_THRESHOLDS,
  ConfidenceDictSchema,
  NEUTRAL_CONFIDENCE,
  RESERVED_KEYS,
  DimensionalConfidence,
  aggregateConfidence,
  confidenceLabel,

  // Errors
  AggregationMethodError,
  ConfidenceParseError,
  ConfidenceRangeError,
  InvalidDimensionNameError,
  InvalidSchemaNameError,

  type CanonicalDimension,
  type CanonicalDimensionValues,
  type ConfidenceDict,
  type ConfidenceLabel,
  type DimensionMap,
  type DimensionalConfidenceInit,
  type FullDimensionValues,
} from './dimensional_confidence.js';

// Schemas and registry
export {
  BUILTIN_SCHEMAS,
  DEFAULT_VALUE_RANGE,
  DimensionRegistry,
  DimensionSchema,
  DimensionSchemaDefinitionSchema,
  getRegistry,
  registerBuiltinSchemas,
  resetRegistry,

  // Errors
  CircularInheritanceError,
  SchemaDefinitionError,
  SchemaNotFoundError,
  SchemaRegistrationError,

  type DimensionSchemaDefinition,
  type ValidationResult,
  type ValueRange,
} from './dimension_registry.js';
