/**
 * @fileoverview Dimensional Confidence Values
 *
 * A confidence value is an overall score plus a sparse set of named
 * sub-dimension scores (source reliability, corroboration, freshness, ...).
 * Every stored number lies in [0, 1]; an absent dimension means "unknown",
 * never zero.
 *
 * Transforms (`withDimension`, `decay`, `boostCorroboration`) return new
 * instances. `setDimension` and `recalculateOverall` are the only operations
 * that change a value in place.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  DEFAULT_CONFIDENCE_SCHEMA,
  isAggregationMethod,
  resolveConfidenceConfig,
  type AggregationMethod,
} from './confidence_config.js';

// ============================================================================
// DIMENSIONS
// ============================================================================

/**
 * The six dimensions of the core confidence schema, in declaration order.
 */
export const CANONICAL_DIMENSIONS = [
  'source_reliability',
  'method_quality',
  'internal_consistency',
  'temporal_freshness',
  'corroboration',
  'domain_applicability',
] as const;

export type CanonicalDimension = (typeof CANONICAL_DIMENSIONS)[number];

/** Dimension identifier to score. */
export type DimensionMap = Record<string, number>;

export type CanonicalDimensionValues = Partial<Record<CanonicalDimension, number>>;

/** All six canonical dimensions, as taken by {@link DimensionalConfidence.full}. */
export type FullDimensionValues = Record<CanonicalDimension, number>;

/**
 * Construction options.
 *
 * The `dimensions` mapping is applied first; canonical dimensions given as
 * named fields override it on conflict.
 */
export interface DimensionalConfidenceInit extends CanonicalDimensionValues {
  dimensions?: Readonly<DimensionMap>;
  schema?: string;
}

/**
 * Names that cannot be used as dimensions: the keys of the serialized form,
 * and `__proto__`, which plain-object assignment does not store.
 */
export const RESERVED_KEYS: readonly string[] = ['overall', 'schema', '__proto__'];

/** Overall score used when there is nothing to derive one from. */
export const NEUTRAL_CONFIDENCE = 0.5;

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when a score outside [0, 1] is stored.
 */
export class ConfidenceRangeError extends RangeError {
  constructor(
    public readonly field: string,
    public readonly value: number
  ) {
    super(`${field} must be between 0 and 1, got ${value}`);
    this.name = 'ConfidenceRangeError';
  }
}

/**
 * Error thrown when a dimension identifier is empty or reserved.
 */
export class InvalidDimensionNameError extends Error {
  constructor(public readonly dimension: string) {
    super(
      dimension.length === 0
        ? 'Dimension name must not be empty'
        : `Dimension name '${dimension}' is reserved`
    );
    this.name = 'InvalidDimensionNameError';
  }
}

/**
 * Error thrown when a confidence value names an empty schema.
 */
export class InvalidSchemaNameError extends Error {
  constructor(public readonly schema: string) {
    super('Schema name must not be empty');
    this.name = 'InvalidSchemaNameError';
  }
}

/**
 * Error thrown when a serialized confidence value has the wrong shape.
 */
export class ConfidenceParseError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid confidence dict: ${issues.join('; ')}`);
    this.name = 'ConfidenceParseError';
  }
}

/**
 * Error thrown for an aggregation method name that is not recognised.
 */
export class AggregationMethodError extends Error {
  constructor(public readonly method: string) {
    super(`Unknown aggregation method: ${method}`);
    this.name = 'AggregationMethodError';
  }
}

function checkUnitInterval(field: string, value: number): number {
  if (!(value >= 0 && value <= 1)) {
    throw new ConfidenceRangeError(field, value);
  }
  return value;
}

function checkDimensionName(name: string): string {
  if (name.length === 0 || RESERVED_KEYS.includes(name)) {
    throw new InvalidDimensionNameError(name);
  }
  return name;
}

function checkSchemaName(schema: string): string {
  if (schema.trim().length === 0) {
    throw new InvalidSchemaNameError(schema);
  }
  return schema;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Plain-object form: `overall`, one key per present dimension, and `schema`
 * only when it differs from the default.
 */
export interface ConfidenceDict {
  overall: number;
  schema?: string;
  [dimension: string]: number | string | undefined;
}

export const ConfidenceDictSchema = z
  .object({
    overall: z.number(),
    schema: z.string().regex(/\S/, 'Schema name must not be empty').optional(),
  })
  .catchall(z.number());

// ============================================================================
// VALUE TYPE
// ============================================================================

export class DimensionalConfidence {
  private _overall: number;
  private readonly _dimensions = new Map<string, number>();
  readonly schema: string;

  constructor(overall: number, init: DimensionalConfidenceInit = {}) {
    this._overall = checkUnitInterval('overall', overall);
    this.schema = checkSchemaName(init.schema ?? DEFAULT_CONFIDENCE_SCHEMA);
    for (const [name, value] of Object.entries(init.dimensions ?? {})) {
      this.storeDimension(name, value);
    }
    for (const name of CANONICAL_DIMENSIONS) {
      const value = init[name];
      if (value !== undefined) {
        this.storeDimension(name, value);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Factories
  // --------------------------------------------------------------------------

  static simple(overall: number): DimensionalConfidence {
    return new DimensionalConfidence(overall);
  }

  /**
   * Build from all six canonical dimensions; `overall` is their mean.
   */
  static full(values: FullDimensionValues): DimensionalConfidence {
    const dimensions: DimensionMap = {};
    for (const name of CANONICAL_DIMENSIONS) {
      dimensions[name] = values[name];
    }
    return DimensionalConfidence.fromDimensions(dimensions);
  }

  /**
   * Build from an arbitrary dimension mapping; `overall` is the mean of the
   * supplied values, or {@link NEUTRAL_CONFIDENCE} when there are none.
   */
  static fromDimensions(dimensions: Readonly<DimensionMap>, schema?: string): DimensionalConfidence {
    const entries = Object.entries(dimensions);
    for (const [name, value] of entries) {
      checkUnitInterval(name, value);
    }
    const overall = entries.length > 0 ? mean(entries.map(([, value]) => value)) : NEUTRAL_CONFIDENCE;
    return new DimensionalConfidence(overall, { dimensions, schema });
  }

  /**
   * Rebuild a value from its {@link ConfidenceDict} form.
   *
   * @throws ConfidenceParseError if the shape is wrong
   * @throws ConfidenceRangeError if a score is outside [0, 1]
   */
  static fromDict(data: unknown): DimensionalConfidence {
    const parsed = ConfidenceDictSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfidenceParseError(
        parsed.error.issues.map((issue) => {
          const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
          return `${path}: ${issue.message}`;
        })
      );
    }
    const dimensions: DimensionMap = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      if (RESERVED_KEYS.includes(key) || typeof value !== 'number') continue;
      dimensions[key] = value;
    }
    return new DimensionalConfidence(parsed.data.overall, {
      dimensions,
      schema: parsed.data.schema,
    });
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get overall(): number {
    return this._overall;
  }

  /** A copy of the present dimensions. */
  get dimensions(): DimensionMap {
    return Object.fromEntries(this._dimensions);
  }

  get dimensionNames(): string[] {
    return Array.from(this._dimensions.keys());
  }

  get sourceReliability(): number | undefined {
    return this._dimensions.get('source_reliability');
  }

  get methodQuality(): number | undefined {
    return this._dimensions.get('method_quality');
  }

  get internalConsistency(): number | undefined {
    return this._dimensions.get('internal_consistency');
  }

  get temporalFreshness(): number | undefined {
    return this._dimensions.get('temporal_freshness');
  }

  get corroboration(): number | undefined {
    return this._dimensions.get('corroboration');
  }

  get domainApplicability(): number | undefined {
    return this._dimensions.get('domain_applicability');
  }

  getDimension(name: string): number | undefined {
    return this._dimensions.get(name);
  }

  hasDimension(name: string): boolean {
    return this._dimensions.has(name);
  }

  /**
   * Store a dimension in place, or remove it when given `null`/`undefined`.
   */
  setDimension(name: string, value: number | null | undefined): void {
    if (value === null || value === undefined) {
      this._dimensions.delete(name);
      return;
    }
    this.storeDimension(name, value);
  }

  // --------------------------------------------------------------------------
  // Transforms
  // --------------------------------------------------------------------------

  clone(): DimensionalConfidence {
    return new DimensionalConfidence(this._overall, {
      dimensions: this.dimensions,
      schema: this.schema,
    });
  }

  withDimension(name: string, value: number): DimensionalConfidence {
    const next = this.clone();
    next.storeDimension(name, value);
    return next;
  }

  withoutDimension(name: string): DimensionalConfidence {
    const next = this.clone();
    next._dimensions.delete(name);
    return next;
  }

  /**
   * Age the value by `factor`.
   *
   * When `temporal_freshness` is tracked only that dimension is scaled;
   * otherwise the overall score itself is.
   */
  decay(factor: number): DimensionalConfidence {
    const next = this.clone();
    const freshness = this._dimensions.get('temporal_freshness');
    if (freshness !== undefined) {
      next.storeDimension('temporal_freshness', freshness * factor);
    } else {
      next._overall = checkUnitInterval('overall', this._overall * factor);
    }
    return next;
  }

  /**
   * Raise `corroboration` by `amount`, capped at 1. A missing corroboration
   * dimension counts as 0.
   */
  boostCorroboration(amount: number): DimensionalConfidence {
    const current = this._dimensions.get('corroboration') ?? 0;
    return this.withDimension('corroboration', Math.min(1, current + amount));
  }

  /**
   * Recompute `overall` in place as the mean of the present dimensions.
   * Leaves `overall` untouched when there are none.
   */
  recalculateOverall(): this {
    if (this._dimensions.size > 0) {
      this._overall = checkUnitInterval('overall', mean(Array.from(this._dimensions.values())));
    }
    return this;
  }

  // --------------------------------------------------------------------------
  // Comparison / serialization
  // --------------------------------------------------------------------------

  equals(other: unknown): boolean {
    if (!(other instanceof DimensionalConfidence)) return false;
    if (this._overall !== other._overall) return false;
    if (this._dimensions.size !== other._dimensions.size) return false;
    for (const [name, value] of this._dimensions) {
      if (other._dimensions.get(name) !== value) return false;
    }
    return true;
  }

  toDict(): ConfidenceDict {
    const dict: ConfidenceDict = { overall: this._overall };
    for (const [name, value] of this._dimensions) {
      dict[name] = value;
    }
    if (this.schema !== DEFAULT_CONFIDENCE_SCHEMA) {
      dict.schema = this.schema;
    }
    return dict;
  }

  toJSON(): ConfidenceDict {
    return this.toDict();
  }

  toString(): string {
    const parts = Array.from(this._dimensions, ([name, value]) => `${name}=${value.toFixed(2)}`);
    const head = `${this._overall.toFixed(2)} ${confidenceLabel(this._overall)}`;
    return parts.length > 0
      ? `DimensionalConfidence(${head}; ${parts.join(', ')})`
      : `DimensionalConfidence(${head})`;
  }

  private storeDimension(name: string, value: number): void {
    this._dimensions.set(checkDimensionName(name), checkUnitInterval(name, value));
  }
}

// ============================================================================
// LABELS
// ============================================================================

export type ConfidenceLabel = 'very high' | 'high' | 'moderate' | 'low' | 'very low';

/** Lower bounds (inclusive) of each band, highest first. */
export const CONFIDENCE_LABEL_THRESHOLDS: ReadonlyArray<{ min: number; label: ConfidenceLabel }> = [
  { min: 0.9, label: 'very high' },
  { min: 0.75, label: 'high' },
  { min: 0.5, label: 'moderate' },
  { min: 0.25, label: 'low' },
];

export function confidenceLabel(overall: number): ConfidenceLabel {
  for (const { min, label } of CONFIDENCE_LABEL_THRESHOLDS) {
    if (overall >= min) return label;
  }
  return 'very low';
}

// ============================================================================
// AGGREGATION
// ============================================================================

function combine(values: readonly number[], method: AggregationMethod): number {
  switch (method) {
    case 'arithmetic':
      return mean(values);
    case 'geometric':
      return Math.pow(
        values.reduce((product, value) => product * value, 1),
        1 / values.length
      );
    case 'minimum':
      return Math.min(...values);
    case 'maximum':
      return Math.max(...values);
  }
}

/**
 * Combine several confidence values into one.
 *
 * Each dimension is combined over only the inputs that carry it. An empty
 * input yields a neutral value; a single input is returned as-is.
 *
 * @param method - defaults to the configured aggregation (arithmetic)
 * @throws AggregationMethodError for an unrecognised method name
 */
export function aggregateConfidence(
  confidences: readonly DimensionalConfidence[],
  method?: AggregationMethod
): DimensionalConfidence {
  if (confidences.length === 0) {
    return new DimensionalConfidence(NEUTRAL_CONFIDENCE);
  }
  if (confidences.length === 1) {
    return confidences[0];
  }

  const resolved: string = method ?? resolveConfidenceConfig().defaultAggregation;
  if (!isAggregationMethod(resolved)) {
    throw new AggregationMethodError(resolved);
  }

  const byDimension = new Map<string, number[]>();
  for (const confidence of confidences) {
    for (const [name, value] of Object.entries(confidence.dimensions)) {
      const bucket = byDimension.get(name);
      if (bucket) {
        bucket.push(value);
      } else {
        byDimension.set(name, [value]);
      }
    }
  }

  const dimensions: DimensionMap = {};
  for (const [name, values] of byDimension) {
    dimensions[name] = combine(values, resolved);
  }

  return new DimensionalConfidence(
    combine(confidences.map((confidence) => confidence.overall), resolved),
    { dimensions }
  );
}
