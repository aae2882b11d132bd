import fs from 'node:fs';
import type { Methodology, SessionRecord } from '../domain/entities/SessionRecord.js';
import type { MetadataStorePort } from '../domain/ports/MetadataStorePort.js';
import { SessionNotFoundError } from '../domain/errors/DomainErrors.js';
import {
  averageMetrics,
  type AnalysisMetrics,
  type MetricKey,
} from '../domain/value-objects/AnalysisMetrics.js';
import { scoreSession } from '../domain/value-objects/SessionQuality.js';
import { energyGlyphs } from '../domain/value-objects/CreativeEnergy.js';
import { analyzeContent } from '../infrastructure/analysis/ConversationPatterns.js';
import type { Logger } from '../shared/Logger.js';
import type {
  ComparisonLeader,
  MethodologyComparison,
  MethodologyStats,
  MetricComparison,
} from './dto/MethodologyStats.js';
import type { SessionAnalysis } from './dto/SessionAnalysis.js';

export interface CompareOptions {
  /** 預設為 store 內全部 session */
  sessions?: SessionRecord[];
  /** 只統計單一方法論 */
  methodology?: Methodology;
}

export interface ReportOptions {
  recommendations?: boolean;
}

/** 直接比較時的指標與顯示名稱 */
const COMPARED_METRICS: ReadonlyArray<[MetricKey, string]> = [
  ['exchanges', 'Conversation Depth'],
  ['code_blocks', 'Code Generation'],
  ['questions_asked', 'Questions Asked'],
  ['enthusiasm_markers', 'Joy/Enthusiasm'],
  ['confusion_markers', 'Confusion/Clarification'],
  ['compaction_indicators', 'Context Loss'],
];

const RULE = '='.repeat(60);

/**
 * 領先幅度（%）：(higher − lower) / lower × 100
 * lower 為 0 時固定回傳 100，代表「嚴格較多」而不做除以零
 */
export function percentDifference(higher: number, lower: number): number {
  if (lower === 0) return 100;
  return ((higher - lower) / lower) * 100;
}

function formatSigned(value: number): string {
  const fixed = value.toFixed(1);
  return value >= 0 ? `+${fixed}` : fixed;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * transcript 以 UTF-8 讀取
 * 合法的 UTF-8 原樣保留；含無法解碼的位元組時，改以寬鬆解碼並去掉替代字元
 * （此時原本就存在的 U+FFFD 也會一併去掉）
 */
function readTranscript(filePath: string): string {
  const bytes = fs.readFileSync(filePath);
  try {
    return strictUtf8.decode(bytes);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return bytes.toString('utf-8').replace(/\uFFFD/g, '');
  }
}

/**
 * Log 分析用例：以詞彙訊號比較 context-driven 與 command-based 兩種方法論
 *
 * - analyzeLogFile：單一 transcript 的指標
 * - compareMethodologies：依方法論分組彙總
 * - compareDirect / generateReport：兩種方法論的直接比較與文字報告
 * - analyzeSession：單一 session 的指標與品質分數
 */
export class LogAnalyzerUseCase {
  constructor(
    private readonly store: MetadataStorePort,
    private readonly logger: Logger,
  ) {}

  /** transcript 不存在時回傳 undefined */
  analyzeLogFile(filePath: string): AnalysisMetrics | undefined {
    if (!fs.existsSync(filePath)) {
      this.logger.debug('Transcript missing, skipped for text metrics', { file: filePath });
      return undefined;
    }
    return analyzeContent(readTranscript(filePath));
  }

  compareMethodologies(options: CompareOptions = {}): Map<Methodology, MethodologyStats> {
    const all = options.sessions ?? this.store.load().sessions;
    const sessions = options.methodology
      ? all.filter((s) => s.methodology === options.methodology)
      : all;

    // 依首次出現的順序分組，不會產生空的組
    const groups = new Map<Methodology, SessionRecord[]>();
    for (const session of sessions) {
      const group = groups.get(session.methodology);
      if (group) group.push(session);
      else groups.set(session.methodology, [session]);
    }

    const result = new Map<Methodology, MethodologyStats>();
    for (const [methodology, group] of groups) {
      result.set(methodology, this.aggregate(methodology, group));
    }
    return result;
  }

  /** 兩種標準方法論都有資料時才比較，否則回傳 null */
  compareDirect(stats: Map<Methodology, MethodologyStats>): MethodologyComparison | null {
    const ctx = stats.get('context-driven');
    const cmd = stats.get('command-based');
    if (!ctx || !cmd) return null;

    const energyDifference = ctx.avgEnergy !== undefined && cmd.avgEnergy !== undefined
      ? ctx.avgEnergy - cmd.avgEnergy
      : null;

    const metrics = COMPARED_METRICS.map(([metric, label]): MetricComparison => {
      const ctxVal = ctx.avgMetrics?.[metric] ?? 0;
      const cmdVal = cmd.avgMetrics?.[metric] ?? 0;

      let leader: ComparisonLeader = 'equal';
      let percent = 0;
      if (ctxVal > cmdVal) {
        leader = 'context-driven';
        percent = percentDifference(ctxVal, cmdVal);
      } else if (cmdVal > ctxVal) {
        leader = 'command-based';
        percent = percentDifference(cmdVal, ctxVal);
      }
      return { metric, label, leader, percent };
    });

    return { energyDifference, metrics };
  }

  generateReport(stats: Map<Methodology, MethodologyStats>, options: ReportOptions = {}): string {
    const lines: string[] = ['', RULE, 'CLAUDE CONVERSATION ANALYSIS REPORT', RULE, ''];

    if (stats.size === 0) {
      lines.push('No sessions found for analysis.');
      return lines.join('\n');
    }

    for (const data of stats.values()) {
      lines.push(...this.methodologyBlock(data), '');
    }

    const comparison = this.compareDirect(stats);
    if (comparison) {
      lines.push(RULE, 'DIRECT COMPARISON', RULE, '');
      if (comparison.energyDifference !== null) {
        lines.push(this.energyLine(comparison.energyDifference), '');
      }
      for (const m of comparison.metrics) {
        lines.push(this.metricLine(m));
      }
      lines.push('');
    }

    if (options.recommendations) {
      lines.push(RULE, 'RECOMMENDATIONS', RULE, '');
      const recommendations = this.recommend(stats);
      if (recommendations.length === 0) {
        lines.push('No specific recommendations - continue logging sessions for better insights.');
      } else {
        recommendations.forEach((r, i) => lines.push(`${i + 1}. ${r}`));
      }
      lines.push('');
    }

    return lines.join('\n');
  }

  /**
   * 簡易建議：
   * 1. 平均 energy 最高且 > 2 的方法論
   * 2. 每 session 平均 confusion 標記 > 2
   * 3. 每 session 平均 code fence > 5
   */
  recommend(stats: Map<Methodology, MethodologyStats>): string[] {
    const recommendations: string[] = [];
    const all = [...stats.values()];

    let best: MethodologyStats | undefined;
    for (const s of all) {
      if (s.avgEnergy === undefined) continue;
      if (!best || (best.avgEnergy ?? 0) < s.avgEnergy) best = s;
    }
    if (best?.avgEnergy !== undefined && best.avgEnergy > 2) {
      recommendations.push(
        `Continue using ${best.methodology} methodology - it shows high creative energy (${best.avgEnergy.toFixed(1)}/3)`,
      );
    }

    for (const s of all) {
      const confusion = s.avgMetrics?.confusion_markers ?? 0;
      if (confusion > 2) {
        recommendations.push(
          `Consider clearer requirements when using ${s.methodology} - high confusion rate (${confusion.toFixed(1)} per session)`,
        );
      }
    }

    for (const s of all) {
      const code = s.avgMetrics?.code_blocks ?? 0;
      if (code > 5) {
        recommendations.push(`${s.methodology} shows high code productivity (${code.toFixed(1)} blocks per session)`);
      }
    }

    return recommendations;
  }

  analyzeSession(sessionId: string): SessionAnalysis {
    const record = this.store.load().sessions.find((s) => s.id === sessionId);
    if (!record) throw new SessionNotFoundError(sessionId);

    const metrics = this.analyzeLogFile(record.log_file) ?? null;
    return {
      record,
      metrics,
      quality: metrics ? scoreSession(metrics) : null,
    };
  }

  private aggregate(methodology: Methodology, group: SessionRecord[]): MethodologyStats {
    const totalDuration = group.reduce((sum, s) => sum + (s.duration ?? 0), 0);
    const energies = group
      .map((s) => s.creative_energy)
      .filter((e): e is number => e !== null && e > 0);

    const samples: AnalysisMetrics[] = [];
    for (const session of group) {
      const metrics = this.analyzeLogFile(session.log_file);
      if (metrics) samples.push(metrics);
    }

    const stats: MethodologyStats = {
      methodology,
      sessions: group.length,
      totalDuration,
      avgDuration: totalDuration / group.length,
      analyzedSessions: samples.length,
      avgMetrics: averageMetrics(samples),
    };
    if (energies.length > 0) {
      stats.avgEnergy = mean(energies);
    }
    return stats;
  }

  private methodologyBlock(data: MethodologyStats): string[] {
    const lines = [
      `📊 Methodology: ${data.methodology.toUpperCase()}`,
      `   Sessions: ${data.sessions}`,
      `   Avg Duration: ${data.avgDuration.toFixed(1)} seconds`,
    ];

    if (data.avgEnergy !== undefined) {
      lines.push(`   Avg Creative Energy: ${energyGlyphs(data.avgEnergy)} (${data.avgEnergy.toFixed(1)}/3)`);
    }

    const m = data.avgMetrics;
    if (m) {
      lines.push(
        `   Avg Exchanges: ${m.exchanges.toFixed(1)}`,
        `   Avg Code Blocks: ${m.code_blocks.toFixed(1)}`,
        `   Avg Questions: ${m.questions_asked.toFixed(1)}`,
        `   Enthusiasm Markers: ${m.enthusiasm_markers.toFixed(1)}`,
        `   Confusion Markers: ${m.confusion_markers.toFixed(1)}`,
        `   Compaction Events: ${m.compaction_indicators.toFixed(1)}`,
      );
    }
    return lines;
  }

  private energyLine(diff: number): string {
    if (diff > 0) return `✨ Creative Energy: ${formatSigned(diff)} in favor of context-driven`;
    if (diff < 0) return `✨ Creative Energy: ${formatSigned(diff)} in favor of command-based`;
    return '✨ Creative Energy: equal in both approaches';
  }

  private metricLine(m: MetricComparison): string {
    if (m.leader === 'equal') return `📈 ${m.label}: Equal in both approaches`;
    const who = m.leader === 'context-driven' ? 'Context-driven' : 'Command-based';
    return `📈 ${m.label}: ${who} ${m.percent.toFixed(0)}% higher`;
  }
}
