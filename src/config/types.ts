import type { LogLevel } from '../shared/Logger.js';

/** 被包裝的 assistant 執行檔 */
export interface AssistantConfig {
  command: string;
}

/** 鏡像終端 I/O 的 transcript 擷取工具（預設 script(1)） */
export interface CaptureConfig {
  command: string;
}

export interface PagerConfig {
  command: string;
}

/** git 設定 */
export interface GitConfig {
  command: string;
  /** 建立 repository 時的首次 commit 訊息 */
  initMessage: string;
  /** git-log 預設顯示筆數 */
  historyLimit: number;
}

/** metadata 附加時的 advisory lock */
export interface LockConfig {
  enabled: boolean;
  retries: number;
  baseDelayMs: number;
  /** lock 檔超過此時間視為殘留，可直接接管 */
  staleMs: number;
}

/** 完整設定 */
export interface DevLogConfig {
  version: number;
  /** 絕對路徑（載入後已依 home 目錄解析） */
  logsDir: string;
  metadataFileName: string;
  assistant: AssistantConfig;
  capture: CaptureConfig;
  pager: PagerConfig;
  git: GitConfig;
  lock: LockConfig;
  logLevel: LogLevel;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof DevLogConfig]?: DevLogConfig[K] extends object ? Partial<DevLogConfig[K]> : DevLogConfig[K];
};
