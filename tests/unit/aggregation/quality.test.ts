import { describe, expect, it } from 'vitest';
import { normalizeQuality, summarizeOutputQuality } from '../../../src/core/aggregation/quality';
import { output } from '../../support/fixtures';

describe('normalizeQuality', () => {
  it('keeps values already on the unit scale', () => {
    expect(normalizeQuality(0)).toBe(0);
    expect(normalizeQuality(0.7)).toBe(0.7);
    expect(normalizeQuality(1)).toBe(1);
  });

  it('reads values above 1 as percentages', () => {
    expect(normalizeQuality(85)).toBe(0.85);
    expect(normalizeQuality(100)).toBe(1);
  });

  it('clamps out-of-range and non-finite values', () => {
    expect(normalizeQuality(150)).toBe(1);
    expect(normalizeQuality(-0.2)).toBe(0);
    expect(normalizeQuality(Number.NaN)).toBe(0);
    expect(normalizeQuality(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('summarizeOutputQuality', () => {
  it('returns zeros for no outputs', () => {
    expect(summarizeOutputQuality([])).toEqual({ count: 0, average: 0, max: 0, min: 0 });
    expect(summarizeOutputQuality(undefined)).toEqual({ count: 0, average: 0, max: 0, min: 0 });
  });

  it('reports count, average, max and min', () => {
    const stats = summarizeOutputQuality([output('a', 'x', 0.2), output('b', 'y', 0.8), output('c', 'z', 0.5)]);

    expect(stats.count).toBe(3);
    expect(stats.average).toBeCloseTo(0.5);
    expect(stats.max).toBe(0.8);
    expect(stats.min).toBe(0.2);
  });
});
