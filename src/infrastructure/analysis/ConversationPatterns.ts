/**
 * transcript 的詞彙訊號計數
 *
 * 全部是不分大小寫的表面文字比對，不理解對話語意。
 * 各類片語清單彼此不重疊，但同一段文字可同時命中多個片語
 * （例如 "this is great!" 同時符合 "great!" 與 "this is great"）。
 */
import type { AnalysisMetrics } from '../../domain/value-objects/AnalysisMetrics.js';

export const HUMAN_TURN_MARKERS = ['Human:', 'You:', 'User:'] as const;

export const ENTHUSIASM_PHRASES = [
  'excellent!', 'great!', 'perfect!', 'fantastic!',
  'love it', 'this is great', '😊', '🎉',
] as const;

export const CONFUSION_PHRASES = [
  "that's not", 'hmm', 'wait', 'actually no',
  'let me clarify', 'i meant', 'not quite',
] as const;

export const COMPACTION_PHRASES = [
  'as we discussed', 'as mentioned', 'remember when',
  'earlier you said', 'previously we',
] as const;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phraseRegex(phrases: readonly string[]): RegExp[] {
  return phrases.map((p) => new RegExp(escapeRegExp(p), 'gi'));
}

const HUMAN_TURN = new RegExp(HUMAN_TURN_MARKERS.map(escapeRegExp).join('|'), 'i');
const CODE_FENCE = /```/g;
/** ? 後面緊接空白或換行 */
const QUESTION = /\?\s/g;

const ENTHUSIASM = phraseRegex(ENTHUSIASM_PHRASES);
const CONFUSION = phraseRegex(CONFUSION_PHRASES);
const COMPACTION = phraseRegex(COMPACTION_PHRASES);

function countMatches(content: string, regex: RegExp): number {
  return content.match(regex)?.length ?? 0;
}

function countAll(content: string, regexes: RegExp[]): number {
  return regexes.reduce((sum, r) => sum + countMatches(content, r), 0);
}

/** 含任一使用者回合標記的行數 */
function countExchanges(content: string): number {
  return content.split(/\r?\n/).filter((line) => HUMAN_TURN.test(line)).length;
}

export function analyzeContent(content: string): AnalysisMetrics {
  return {
    exchanges: countExchanges(content),
    // 每個完整 code block 有開、關兩個 fence，計為 2
    code_blocks: countMatches(content, CODE_FENCE),
    questions_asked: countMatches(content, QUESTION),
    enthusiasm_markers: countAll(content, ENTHUSIASM),
    confusion_markers: countAll(content, CONFUSION),
    compaction_indicators: countAll(content, COMPACTION),
  };
}
