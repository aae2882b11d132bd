import type { SessionRecord } from '../../domain/entities/SessionRecord.js';
import { energyGlyphs } from '../../domain/value-objects/CreativeEnergy.js';
import type { SessionRunResult } from '../../application/dto/SessionRunResult.js';
import type { SessionAnalysis } from '../../application/dto/SessionAnalysis.js';

export type OutputFormat = 'json' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];

function minutes(seconds: number | null): string {
  return ((seconds ?? 0) / 60).toFixed(1);
}

/**
 * CLI 輸出格式化器
 *
 * - json：原樣序列化（給腳本使用）
 * - text：人類可讀的摘要
 */
export class SessionFormatter {
  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  formatSessionList(sessions: SessionRecord[], format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(sessions, null, 2);
    if (sessions.length === 0) return 'No sessions logged yet.';

    const blocks = sessions.map((s) => {
      const lines = [
        `📅 ${s.timestamp}`,
        `   Session ID: ${s.id}`,
        `   Project: ${s.project}`,
        `   Methodology: ${s.methodology}`,
        `   Duration: ${minutes(s.duration)} minutes`,
      ];
      if (s.creative_energy) lines.push(`   Energy: ${energyGlyphs(s.creative_energy)}`);
      return lines.join('\n');
    });
    return ['=== Logged Claude Sessions ===', '', blocks.join('\n\n')].join('\n');
  }

  /** show 指令在開啟 pager 前印出的摘要 */
  formatSessionDetail(record: SessionRecord): string {
    const lines = [
      `=== Session ${record.id} ===`,
      `Project: ${record.project}`,
      `Methodology: ${record.methodology}`,
      `Duration: ${minutes(record.duration)} minutes`,
    ];
    if (record.creative_energy) lines.push(`Energy: ${energyGlyphs(record.creative_energy)}`);
    return lines.join('\n');
  }

  /** session 結束後的回報；未產生 commit 時明確標示 */
  formatRunSummary(result: SessionRunResult): string {
    const { record } = result;
    const duration = record.duration ?? 0;
    const lines: string[] = [];

    if (result.outcome.kind === 'interrupted') lines.push('Session interrupted');

    lines.push(
      `📝 Session logged to: ${record.log_file}`,
      `📊 Methodology: ${record.methodology}`,
      `⏱️  Duration: ${duration.toFixed(2)} seconds (${minutes(duration)} minutes)`,
    );

    lines.push(result.commitId
      ? `🔒 Git commit: ${result.commitId}`
      : '⚠️  Not version-controlled: git commit did not complete');

    if (record.creative_energy) {
      lines.push(`🔋 Creative Energy: ${energyGlyphs(record.creative_energy)}`);
    }

    for (const step of result.steps) {
      if (step.status === 'failed') {
        lines.push(`❌ ${step.name} step failed: ${step.error ?? 'unknown error'}`);
      }
    }
    return lines.join('\n');
  }

  formatSessionAnalysis(analysis: SessionAnalysis, format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(analysis, null, 2);

    const { record, metrics, quality } = analysis;
    const lines = [
      `=== Session ${record.id} ===`,
      `Project: ${record.project}`,
      `Methodology: ${record.methodology}`,
      `Duration: ${minutes(record.duration)} minutes`,
    ];
    if (!metrics || !quality) {
      lines.push(`Log file not found: ${record.log_file}`);
      return lines.join('\n');
    }

    lines.push(
      '',
      'Metrics:',
      this.flattenToText(metrics, 1),
      '',
      'Quality (0-100):',
      `  Engagement: ${quality.engagement.toFixed(1)}`,
      `  Clarity: ${quality.clarity.toFixed(1)}`,
      `  Productivity: ${quality.productivity.toFixed(1)}`,
      `  Overall: ${quality.overall.toFixed(1)}`,
    );
    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
