import type { Methodology } from '../../domain/entities/SessionRecord.js';
import type { AnalysisMetrics, MetricKey } from '../../domain/value-objects/AnalysisMetrics.js';

/** 同一方法論下所有 session 的彙總 */
export interface MethodologyStats {
  methodology: Methodology;
  sessions: number;
  /** 秒 */
  totalDuration: number;
  avgDuration: number;
  /** 沒有任何 session 記錄 energy 時不存在 */
  avgEnergy?: number;
  /** transcript 仍在磁碟上、納入文字指標的 session 數 */
  analyzedSessions: number;
  /** analyzedSessions 為 0 時為 null */
  avgMetrics: AnalysisMetrics | null;
}

export type ComparisonLeader = 'context-driven' | 'command-based' | 'equal';

export interface MetricComparison {
  metric: MetricKey;
  label: string;
  leader: ComparisonLeader;
  /** 領先幅度（%）；equal 時為 0 */
  percent: number;
}

/** context-driven 與 command-based 的直接比較 */
export interface MethodologyComparison {
  /** context-driven − command-based；任一方沒有 energy 資料時為 null */
  energyDifference: number | null;
  metrics: MetricComparison[];
}
