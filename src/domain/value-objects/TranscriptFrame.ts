import type { SessionRecord } from '../entities/SessionRecord.js';

const SEPARATOR = '='.repeat(50);

/** transcript 開頭區塊，結尾留一行空白再接 session 內容 */
export function formatTranscriptHeader(record: SessionRecord): string {
  return [
    '=== Claude CLI Session Started ===',
    `Timestamp: ${record.timestamp}`,
    `Project: ${record.project}`,
    `Methodology: ${record.methodology}`,
    `Working Directory: ${record.working_directory}`,
    `Command: ${record.command}`,
    SEPARATOR,
    '',
    '',
  ].join('\n');
}

export function formatTranscriptFooter(endTime: string, durationSeconds: number): string {
  return [
    '',
    '',
    SEPARATOR,
    '=== Claude CLI Session Ended ===',
    `End Time: ${endTime}`,
    `Duration: ${durationSeconds.toFixed(2)} seconds`,
    SEPARATOR,
    '',
  ].join('\n');
}
