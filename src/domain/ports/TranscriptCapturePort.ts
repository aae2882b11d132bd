import type { ExecutionOutcome } from '../value-objects/ExecutionOutcome.js';

export interface CaptureRequest {
  /** assistant 執行檔 */
  command: string;
  args: string[];
  /** 重建後的完整指令字串 */
  commandLine: string;
  /** transcript 檔案（append 模式寫入） */
  logFile: string;
  cwd: string;
}

/** 將互動 I/O 原樣鏡像到 transcript 的執行器 */
export interface TranscriptCapturePort {
  run(request: CaptureRequest): Promise<ExecutionOutcome>;
}
