import { describe, expect, it } from 'vitest';
import * as entry from '../index.js';

describe('package entry', () => {
  it('exposes the confidence model and registry', () => {
    expect(typeof entry.DimensionalConfidence).toBe('function');
    expect(typeof entry.aggregateConfidence).toBe('function');
    expect(typeof entry.confidenceLabel).toBe('function');
    expect(typeof entry.DimensionRegistry).toBe('function');
    expect(typeof entry.DimensionSchema).toBe('function');
    expect(typeof entry.getRegistry).toBe('function');
    expect(typeof entry.resetRegistry).toBe('function');
  });

  it('exposes the loggers', () => {
    expect(typeof entry.logDebug).toBe('function');
    expect(typeof entry.logWarning).toBe('function');
  });

  it('works end to end through the public surface', () => {
    const sources = [
      entry.DimensionalConfidence.fromDimensions({ honesty: 0.9, conclusions: 0.6 }, 'v1.trust.extended'),
      entry.DimensionalConfidence.fromDimensions({ honesty: 0.7, conclusions: 0.8 }, 'v1.trust.extended'),
    ];
    const combined = entry.aggregateConfidence(sources, 'minimum');

    expect(combined.toDict()).toEqual({ overall: 0.75, honesty: 0.7, conclusions: 0.6 });
    expect(entry.confidenceLabel(combined.overall)).toBe('high');
    expect(entry.getRegistry().validate('v1.trust.extended', combined.dimensions)).toEqual({
      valid: true,
      errors: [],
    });
  });
});
