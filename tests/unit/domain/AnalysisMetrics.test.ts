import { describe, it, expect } from 'vitest';
import { averageMetrics, emptyMetrics } from '../../../src/domain/value-objects/AnalysisMetrics.js';

describe('averageMetrics', () => {
  it('returns null for no samples', () => {
    expect(averageMetrics([])).toBeNull();
  });

  it('averages each field', () => {
    const a = { ...emptyMetrics(), exchanges: 4, code_blocks: 2 };
    const b = { ...emptyMetrics(), exchanges: 1, questions_asked: 3 };
    expect(averageMetrics([a, b])).toEqual({
      exchanges: 2.5,
      code_blocks: 1,
      questions_asked: 1.5,
      enthusiasm_markers: 0,
      confusion_markers: 0,
      compaction_indicators: 0,
    });
  });
});
