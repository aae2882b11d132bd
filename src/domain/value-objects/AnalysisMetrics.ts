/** 單一 transcript 的詞彙計數結果（不持久化） */
export interface AnalysisMetrics {
  exchanges: number;
  code_blocks: number;
  questions_asked: number;
  enthusiasm_markers: number;
  confusion_markers: number;
  compaction_indicators: number;
}

export type MetricKey = keyof AnalysisMetrics;

export const METRIC_KEYS: readonly MetricKey[] = [
  'exchanges',
  'code_blocks',
  'questions_asked',
  'enthusiasm_markers',
  'confusion_markers',
  'compaction_indicators',
];

export function emptyMetrics(): AnalysisMetrics {
  return {
    exchanges: 0,
    code_blocks: 0,
    questions_asked: 0,
    enthusiasm_markers: 0,
    confusion_markers: 0,
    compaction_indicators: 0,
  };
}

/** 逐欄位平均；空陣列回傳 null */
export function averageMetrics(samples: AnalysisMetrics[]): AnalysisMetrics | null {
  if (samples.length === 0) return null;

  const avg = emptyMetrics();
  for (const key of METRIC_KEYS) {
    const sum = samples.reduce((acc, s) => acc + s[key], 0);
    avg[key] = sum / samples.length;
  }
  return avg;
}
