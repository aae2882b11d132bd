import type { SessionRecord } from '../../domain/entities/SessionRecord.js';
import type { AnalysisMetrics } from '../../domain/value-objects/AnalysisMetrics.js';
import type { SessionQuality } from '../../domain/value-objects/SessionQuality.js';

/** 單一 session 的分析結果；transcript 不存在時 metrics / quality 為 null */
export interface SessionAnalysis {
  record: SessionRecord;
  metrics: AnalysisMetrics | null;
  quality: SessionQuality | null;
}
