import { describe, expect, it } from 'vitest';
import { isConflicting, isSimilar, jaccardSimilarity } from '../../../src/core/aggregation/textSimilarity';

describe('textSimilarity', () => {
  it('treats high word overlap as similar', () => {
    expect(jaccardSimilarity('fix the null pointer bug', 'fix the null pointer issue')).toBeCloseTo(4 / 6);
    expect(isSimilar('fix the null pointer bug', 'fix the null pointer issue')).toBe(true);
  });

  it('treats unrelated texts as dissimilar', () => {
    expect(jaccardSimilarity('fix nulls', 'optimize database indexes')).toBe(0);
    expect(isSimilar('fix nulls', 'optimize database indexes')).toBe(false);
  });

  it('ignores case and runs of whitespace', () => {
    expect(jaccardSimilarity('Fix  The\tBug', 'fix the bug')).toBe(1);
  });

  it('requires overlap strictly above 0.6', () => {
    expect(jaccardSimilarity('The answer is yes', 'The answer is no')).toBeCloseTo(0.6);
    expect(isSimilar('The answer is yes', 'The answer is no')).toBe(false);
  });

  it('scores texts without words as dissimilar', () => {
    expect(jaccardSimilarity('', '   ')).toBe(0);
    expect(isSimilar('', '')).toBe(false);
  });

  it('flags yes/no, always/never and must/must not contradictions', () => {
    expect(isConflicting('The answer is yes', 'The answer is no')).toBe(true);
    expect(isConflicting('Always validate input', 'Never trust input')).toBe(true);
    expect(isConflicting('You must lock the row', 'You must not lock the row')).toBe(true);
  });

  it('is directional and purely lexical', () => {
    expect(isConflicting('The answer is no', 'The answer is yes')).toBe(false);
    expect(isConflicting('YES, ship it', 'I know it works')).toBe(true);
    expect(isConflicting('use a cache', 'add an index')).toBe(false);
  });
});
