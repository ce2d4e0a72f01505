/**
 * @fileoverview Dimension Schema Registry
 *
 * Named declarations of which confidence dimensions belong together, which
 * are mandatory, and the numeric range their values must fall in. A schema
 * may inherit from another by name; the registry resolves the chain on
 * demand and validates dimension mappings against the result.
 *
 * INVARIANT: a schema is only registered once its parent is registered
 * INVARIANT: resolve() never loops; a revisited name is a CircularInheritanceError
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { CANONICAL_DIMENSIONS, type DimensionalConfidence } from './dimensional_confidence.js';

// ============================================================================
// TYPES
// ============================================================================

export type ValueRange = readonly [low: number, high: number];

export const DEFAULT_VALUE_RANGE: ValueRange = [0, 1];

/**
 * Plain-object description of a schema.
 */
export interface DimensionSchemaDefinition {
  name: string;
  dimensions?: readonly string[];
  required?: readonly string[];
  valueRange?: ValueRange;
  /** Name of the parent schema, looked up in the registry at resolution time */
  inherits?: string;
  description?: string;
}

/**
 * Outcome of checking a dimension mapping against a schema.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const DimensionSchemaDefinitionSchema = z
  .object({
    name: z.string(),
    dimensions: z.array(z.string().min(1)).optional(),
    required: z.array(z.string().min(1)).optional(),
    valueRange: z.tuple([z.number(), z.number()]).optional(),
    inherits: z.string().min(1).optional(),
    description: z.string().optional(),
  })
  .strict();

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when a schema declaration is malformed.
 */
export class SchemaDefinitionError extends Error {
  constructor(
    public readonly schemaName: string,
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * Error thrown when a schema is registered before its parent.
 */
export class SchemaRegistrationError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly parent: string
  ) {
    super(`Cannot register '${schemaName}': parent schema '${parent}' is not registered`);
    this.name = 'SchemaRegistrationError';
  }
}

/**
 * Error thrown when a schema, or a parent named along an inheritance chain,
 * is not in the registry.
 */
export class SchemaNotFoundError extends Error {
  constructor(public readonly schemaName: string) {
    super(`Schema not found: ${schemaName}`);
    this.name = 'SchemaNotFoundError';
  }
}

/**
 * Error thrown when an inheritance chain revisits a schema.
 */
export class CircularInheritanceError extends Error {
  constructor(public readonly chain: readonly string[]) {
    super(`Circular inheritance detected: ${chain.join(' -> ')}`);
    this.name = 'CircularInheritanceError';
  }
}

// ============================================================================
// SCHEMA
// ============================================================================

export class DimensionSchema {
  readonly name: string;
  readonly dimensions: readonly string[];
  readonly required: readonly string[];
  readonly valueRange: ValueRange;
  readonly inherits?: string;
  readonly description?: string;

  /**
   * @throws SchemaDefinitionError for an empty name, an inverted range, or a
   * required dimension that is not declared
   */
  constructor(definition: DimensionSchemaDefinition) {
    const { name, dimensions = [], required = [], valueRange = DEFAULT_VALUE_RANGE } = definition;

    if (name.trim().length === 0) {
      throw new SchemaDefinitionError(name, 'Schema name must not be empty');
    }
    const [low, high] = valueRange;
    if (!(low < high)) {
      throw new SchemaDefinitionError(
        name,
        `Schema '${name}': value range low (${low}) must be less than high (${high})`
      );
    }
    for (const dimension of required) {
      if (!dimensions.includes(dimension)) {
        throw new SchemaDefinitionError(
          name,
          `Schema '${name}': required dimension '${dimension}' not in dimensions`
        );
      }
    }

    this.name = name;
    this.dimensions = Object.freeze([...dimensions]);
    this.required = Object.freeze([...required]);
    this.valueRange = Object.freeze([low, high] as const);
    this.inherits = definition.inherits;
    this.description = definition.description;
    Object.freeze(this);
  }

  /**
   * Build a schema from untrusted input such as parsed JSON.
   */
  static fromDefinition(input: unknown): DimensionSchema {
    const parsed = DimensionSchemaDefinitionSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
        return `${path}: ${issue.message}`;
      });
      const name = readName(input);
      throw new SchemaDefinitionError(
        name,
        `Malformed schema definition '${name}': ${issues.join('; ')}`,
        issues
      );
    }
    return new DimensionSchema(parsed.data);
  }

  toDefinition(): DimensionSchemaDefinition {
    const definition: DimensionSchemaDefinition = {
      name: this.name,
      dimensions: [...this.dimensions],
      required: [...this.required],
      valueRange: [this.valueRange[0], this.valueRange[1]],
    };
    if (this.inherits !== undefined) definition.inherits = this.inherits;
    if (this.description !== undefined) definition.description = this.description;
    return definition;
  }
}

function readName(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'name' in input && typeof input.name === 'string') {
    return input.name;
  }
  return '<unnamed>';
}

// ============================================================================
// REGISTRY
// ============================================================================

export class DimensionRegistry {
  protected readonly schemas = new Map<string, DimensionSchema>();

  /**
   * Store a schema, replacing any schema of the same name.
   *
   * @throws SchemaRegistrationError if the declared parent is not registered
   */
  register(schema: DimensionSchema): void {
    if (schema.inherits !== undefined && !this.schemas.has(schema.inherits)) {
      throw new SchemaRegistrationError(schema.name, schema.inherits);
    }
    const replaced = this.schemas.has(schema.name);
    this.schemas.set(schema.name, schema);
    logDebug('[dimension-registry] Registered schema', {
      schema: schema.name,
      inherits: schema.inherits,
      replaced,
    });
  }

  get(name: string): DimensionSchema | undefined {
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  unregister(name: string): boolean {
    const removed = this.schemas.delete(name);
    if (removed) {
      logDebug('[dimension-registry] Unregistered schema', { schema: name });
    }
    return removed;
  }

  clear(): void {
    const removed = this.schemas.size;
    this.schemas.clear();
    logDebug('[dimension-registry] Cleared schemas', { removed });
  }

  /** All schemas, ordered by name. */
  listSchemas(): DimensionSchema[] {
    return Array.from(this.schemas.values()).sort((left, right) =>
      left.name < right.name ? -1 : left.name > right.name ? 1 : 0
    );
  }

  /**
   * Merge a schema with its ancestors.
   *
   * Dimensions come root-ancestor first, each in declared order, skipping
   * names already seen; `required` is the union along the chain. The range
   * and description are the named schema's own. A schema without a parent
   * resolves to itself.
   *
   * @throws SchemaNotFoundError if `name` or a parent along the chain is unknown
   * @throws CircularInheritanceError if the chain revisits a schema
   */
  resolve(name: string): DimensionSchema {
    const chain = this.collectChain(name);
    const [leaf] = chain;
    if (chain.length === 1) {
      return leaf;
    }

    const dimensions: string[] = [];
    const required: string[] = [];
    for (const schema of [...chain].reverse()) {
      appendUnseen(dimensions, schema.dimensions);
      appendUnseen(required, schema.required);
    }

    return new DimensionSchema({
      name: leaf.name,
      dimensions,
      required,
      valueRange: leaf.valueRange,
      description: leaf.description,
    });
  }

  /**
   * Check a dimension mapping against a (resolved) schema, reporting every
   * violation in one pass. Data problems never throw.
   *
   * @throws CircularInheritanceError if the schema's chain is cyclic
   */
  validate(schemaName: string, values: Readonly<Record<string, number>>): ValidationResult {
    if (!this.schemas.has(schemaName)) {
      return { valid: false, errors: [`Unknown schema: ${schemaName}`] };
    }

    const resolved = this.resolve(schemaName);
    const [low, high] = resolved.valueRange;
    const errors: string[] = [];

    for (const [dimension, value] of Object.entries(values)) {
      if (!resolved.dimensions.includes(dimension)) {
        errors.push(`Unknown dimension: ${dimension}`);
      }
      if (!(value >= low && value <= high)) {
        errors.push(`Dimension '${dimension}' value ${value} out of range [${low}, ${high}]`);
      }
    }
    for (const dimension of resolved.required) {
      if (!Object.prototype.hasOwnProperty.call(values, dimension)) {
        errors.push(`Missing required dimension: ${dimension}`);
      }
    }

    if (errors.length > 0) {
      logDebug('[dimension-registry] Validation failed', { schema: schemaName, errors });
    }
    return { valid: errors.length === 0, errors };
  }

  /**
   * Validate a confidence value's dimensions, against its own schema unless
   * another is named.
   */
  validateConfidence(confidence: DimensionalConfidence, schemaName: string = confidence.schema): ValidationResult {
    return this.validate(schemaName, confidence.dimensions);
  }

  private collectChain(name: string): DimensionSchema[] {
    const chain: DimensionSchema[] = [];
    const path: string[] = [];
    const visited = new Set<string>();
    let key: string | undefined = name;

    while (key !== undefined) {
      if (visited.has(key)) {
        const cycle = [...path, key];
        logWarning('[dimension-registry] Circular inheritance detected', { schema: name, chain: cycle });
        throw new CircularInheritanceError(cycle);
      }
      const schema = this.schemas.get(key);
      if (!schema) {
        throw new SchemaNotFoundError(key);
      }
      visited.add(key);
      path.push(key);
      chain.push(schema);
      key = schema.inherits;
    }

    return chain;
  }
}

function appendUnseen(target: string[], names: readonly string[]): void {
  for (const name of names) {
    if (!target.includes(name)) target.push(name);
  }
}

// ============================================================================
// BUILT-IN SCHEMAS
// ============================================================================

export const BUILTIN_SCHEMAS: readonly DimensionSchemaDefinition[] = [
  {
    name: 'v1.confidence.core',
    dimensions: CANONICAL_DIMENSIONS,
    description: 'Core confidence dimensions for extracted assertions',
  },
  {
    name: 'v1.trust.core',
    dimensions: ['honesty', 'competence', 'benevolence', 'reliability'],
    required: ['honesty'],
    description: 'Core trust judgement about a source',
  },
  {
    name: 'v1.trust.extended',
    inherits: 'v1.trust.core',
    dimensions: ['honesty', 'conclusions', 'transparency', 'consistency'],
    required: ['conclusions'],
    description: 'Trust judgement extended with the soundness of conclusions drawn',
  },
];

/**
 * Register the built-in schemas, parents first.
 */
export function registerBuiltinSchemas(registry: DimensionRegistry): void {
  for (const definition of BUILTIN_SCHEMAS) {
    registry.register(new DimensionSchema(definition));
  }
}

// ============================================================================
// GLOBAL REGISTRY
// ============================================================================

let globalRegistry: DimensionRegistry | null = null;

/**
 * Get the process-wide registry, creating it with the built-in schemas on
 * first use.
 *
 * INVARIANT: Returns the same instance throughout the process lifecycle
 */
export function getRegistry(): DimensionRegistry {
  if (!globalRegistry) {
    globalRegistry = new DimensionRegistry();
    registerBuiltinSchemas(globalRegistry);
  }
  return globalRegistry;
}

/**
 * Drop every custom registration and restore the built-in schemas.
 *
 * The instance is reset in place, so references obtained from getRegistry()
 * stay valid.
 */
export function resetRegistry(): void {
  if (!globalRegistry) return;
  globalRegistry.clear();
  registerBuiltinSchemas(globalRegistry);
}
