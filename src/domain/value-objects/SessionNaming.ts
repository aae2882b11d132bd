import type { Methodology } from '../entities/SessionRecord.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** 以本地時間產生 YYYYMMDD_HHMMSS 形式的 session id */
export function formatSessionId(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function transcriptFileName(project: string, methodology: Methodology, sessionId: string): string {
  return `claude_${project}_${methodology}_${sessionId}.log`;
}

/** 重建傳給 assistant 的指令字串；無參數時不留尾端空白 */
export function reconstructCommand(assistantCommand: string, args: readonly string[]): string {
  return [assistantCommand, ...args].join(' ');
}
