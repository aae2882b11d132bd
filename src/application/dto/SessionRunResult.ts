import type { SessionRecord } from '../../domain/entities/SessionRecord.js';
import type { ExecutionOutcome } from '../../domain/value-objects/ExecutionOutcome.js';

export type FinalizationStepName = 'footer' | 'energy' | 'metadata' | 'commit';

/**
 * 收尾步驟的結果
 * - degraded：步驟本身沒出錯，但結果不完整（例如 commit 沒有產生 hash）
 */
export interface FinalizationStep {
  name: FinalizationStepName;
  status: 'ok' | 'failed' | 'degraded';
  error?: string;
}

export interface SessionRunResult {
  record: SessionRecord;
  outcome: ExecutionOutcome;
  /** 與 assistant 本身的結束碼一致；中斷時為 130 */
  exitCode: number;
  /** null = 已寫入磁碟但未進版控 */
  commitId: string | null;
  steps: FinalizationStep[];
}
