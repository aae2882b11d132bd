import { describe, it, expect } from 'vitest';
import { scoreSession } from '../../../src/domain/value-objects/SessionQuality.js';
import { emptyMetrics } from '../../../src/domain/value-objects/AnalysisMetrics.js';

describe('scoreSession', () => {
  it('scores an empty transcript from the base values', () => {
    const q = scoreSession(emptyMetrics());
    expect(q.engagement).toBe(50);
    expect(q.clarity).toBe(70);
    expect(q.productivity).toBe(40);
    expect(q.overall).toBeCloseTo(160 / 3, 10);
  });

  it('caps each contribution', () => {
    const q = scoreSession({
      exchanges: 20,
      code_blocks: 10,
      questions_asked: 0,
      enthusiasm_markers: 10,
      confusion_markers: 0,
      compaction_indicators: 10,
    });
    // 50 + 30 + 20
    expect(q.engagement).toBe(100);
    // 40 + 40 + 20
    expect(q.productivity).toBe(100);
  });

  it('penalizes confusion and surplus questions', () => {
    const q = scoreSession({
      ...emptyMetrics(),
      exchanges: 2,
      questions_asked: 5,
      confusion_markers: 2,
    });
    // 50 + 0 + 4 - 10
    expect(q.engagement).toBe(44);
    // 70 - 20 - 6
    expect(q.clarity).toBe(44);
  });

  it('caps the penalties', () => {
    const q = scoreSession({ ...emptyMetrics(), confusion_markers: 10, questions_asked: 30 });
    // 70 - 40 - 20
    expect(q.clarity).toBe(10);
    // 50 - 20
    expect(q.engagement).toBe(30);
  });
});
