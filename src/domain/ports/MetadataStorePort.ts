import type { MetadataDocument, SessionRecord } from '../entities/SessionRecord.js';

/** 載入時未通過驗證、被隔離的原始項目 */
export interface QuarantinedEntry {
  index: number;
  reason: string;
  raw: unknown;
}

export interface LoadedMetadata extends MetadataDocument {
  quarantined: QuarantinedEntry[];
}

export interface MetadataStorePort {
  /** 讀取並驗證文件；檔案不存在時回傳空 sessions */
  load(): LoadedMetadata;
  /** 覆寫整份文件 */
  save(document: MetadataDocument): void;
  /** 重新讀取、附加一筆紀錄後寫回（保留被隔離的原始項目） */
  append(record: SessionRecord): Promise<void>;
}
