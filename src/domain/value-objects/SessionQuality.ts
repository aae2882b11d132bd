import type { AnalysisMetrics } from './AnalysisMetrics.js';

/**
 * 由詞彙計數推導的 0–100 分數
 *
 * 純粹是啟發式指標，僅供同一批 log 之間相對比較。
 */
export interface SessionQuality {
  engagement: number;
  clarity: number;
  productivity: number;
  overall: number;
}

function clamp(score: number): number {
  return Math.min(100, Math.max(0, score));
}

export function scoreSession(m: AnalysisMetrics): SessionQuality {
  const engagement = clamp(
    50
      + Math.min(m.enthusiasm_markers * 10, 30)
      + Math.min((m.exchanges / 10) * 20, 20)
      - Math.min(m.confusion_markers * 5, 20),
  );

  // 問題數超過回合數才扣分
  const questionPenalty = m.questions_asked > m.exchanges
    ? Math.min((m.questions_asked - m.exchanges) * 2, 20)
    : 0;
  const clarity = clamp(70 - Math.min(m.confusion_markers * 10, 40) - questionPenalty);

  const productivity = clamp(
    40 + Math.min(m.code_blocks * 15, 40) + Math.min(m.compaction_indicators * 5, 20),
  );

  return {
    engagement,
    clarity,
    productivity,
    overall: (engagement + clarity + productivity) / 3,
  };
}
