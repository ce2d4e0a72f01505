import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AGGREGATION_METHODS,
  CONFIDENCE_ENV_VARS,
  DEFAULT_CONFIDENCE_CONFIG,
  getEnvConfig,
  isAggregationMethod,
  resolveConfidenceConfig,
} from '../confidence_config.js';

describe('confidence_config', () => {
  let originalLevel: string | undefined;

  beforeEach(() => {
    originalLevel = process.env.CONFIDENCE_LOG_LEVEL;
    process.env.CONFIDENCE_LOG_LEVEL = 'warn';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (typeof originalLevel === 'string') process.env.CONFIDENCE_LOG_LEVEL = originalLevel;
    else delete process.env.CONFIDENCE_LOG_LEVEL;
  });

  it('recognizes every aggregation method', () => {
    for (const method of AGGREGATION_METHODS) {
      expect(isAggregationMethod(method)).toBe(true);
    }
    expect(isAggregationMethod('median')).toBe(false);
    expect(isAggregationMethod(3)).toBe(false);
  });

  it('defaults to arithmetic aggregation', () => {
    expect(resolveConfidenceConfig({}, {} as NodeJS.ProcessEnv)).toEqual(DEFAULT_CONFIDENCE_CONFIG);
    expect(DEFAULT_CONFIDENCE_CONFIG.defaultAggregation).toBe('arithmetic');
  });

  it('reads the aggregation method from the environment', () => {
    const env = { [CONFIDENCE_ENV_VARS.DEFAULT_AGGREGATION]: ' Geometric ' } as NodeJS.ProcessEnv;
    expect(getEnvConfig(env)).toEqual({ defaultAggregation: 'geometric' });
    expect(resolveConfidenceConfig({}, env).defaultAggregation).toBe('geometric');
  });

  it('ignores blank environment values', () => {
    const env = { [CONFIDENCE_ENV_VARS.DEFAULT_AGGREGATION]: '  ' } as NodeJS.ProcessEnv;
    expect(getEnvConfig(env)).toEqual({});
  });

  it('warns about and ignores unknown environment values', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const env = { [CONFIDENCE_ENV_VARS.DEFAULT_AGGREGATION]: 'median' } as NodeJS.ProcessEnv;

    expect(resolveConfidenceConfig({}, env).defaultAggregation).toBe('arithmetic');
    expect(spy).toHaveBeenCalledWith('[confidence] Ignoring unknown aggregation method from environment', {
      variable: 'CONFIDENCE_DEFAULT_AGGREGATION',
      value: 'median',
    });
  });

  it('prefers explicit overrides over the environment', () => {
    const env = { [CONFIDENCE_ENV_VARS.DEFAULT_AGGREGATION]: 'minimum' } as NodeJS.ProcessEnv;
    expect(resolveConfidenceConfig({ defaultAggregation: 'maximum' }, env).defaultAggregation).toBe('maximum');
    expect(resolveConfidenceConfig({ defaultAggregation: undefined }, env).defaultAggregation).toBe('minimum');
  });
});
