/** 可辨識的開發方法論；無標記檔或無法判斷時為 unknown */
export const METHODOLOGIES = ['context-driven', 'command-based', 'unknown'] as const;

export type Methodology = (typeof METHODOLOGIES)[number];

export function isMethodology(value: string): value is Methodology {
  return METHODOLOGIES.some((m) => m === value);
}

/**
 * 單次 session 的 metadata 紀錄
 *
 * 欄位名稱沿用磁碟上 JSON 文件的 snake_case，讀寫不需轉換。
 * duration 與 end_time 於 session 結束時一併寫入。
 */
export interface SessionRecord {
  /** YYYYMMDD_HHMMSS（本地時間） */
  id: string;
  /** session 開始時間（ISO-8601） */
  timestamp: string;
  project: string;
  methodology: Methodology;
  working_directory: string;
  command: string;
  log_file: string;
  /** 秒數；session 結束前為 null */
  duration: number | null;
  end_time: string | null;
  /** 保留欄位，建立時一律為空陣列 */
  features_worked_on: string[];
  /** 1–3；未追蹤或使用者略過時為 null */
  creative_energy: number | null;
}

/** sessions_metadata.json 的完整內容，依 append 順序排列 */
export interface MetadataDocument {
  sessions: SessionRecord[];
}
