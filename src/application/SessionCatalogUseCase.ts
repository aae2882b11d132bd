import fs from 'node:fs';
import type { Methodology, SessionRecord } from '../domain/entities/SessionRecord.js';
import type { MetadataStorePort } from '../domain/ports/MetadataStorePort.js';
import type { VersionControlPort } from '../domain/ports/VersionControlPort.js';
import type { PagerPort } from '../domain/ports/PagerPort.js';
import { SessionNotFoundError } from '../domain/errors/DomainErrors.js';

/** list 的過濾條件 */
export interface SessionListFilter {
  methodology?: Methodology;
  limit?: number;
}

export interface ShowResult {
  record: SessionRecord;
  transcriptExists: boolean;
}

function startedAtMs(record: SessionRecord): number {
  const ms = Date.parse(record.timestamp);
  return Number.isNaN(ms) ? 0 : ms;
}

/** 已紀錄 session 的查詢：列表、單筆、transcript 分頁顯示與 git 歷史 */
export class SessionCatalogUseCase {
  constructor(
    private readonly store: MetadataStorePort,
    private readonly vcs: VersionControlPort,
    private readonly pager: PagerPort,
    private readonly logsDir: string,
  ) {}

  /** 依開始時間由新到舊 */
  list(filter: SessionListFilter = {}): SessionRecord[] {
    let sessions = this.store.load().sessions;
    if (filter.methodology) {
      sessions = sessions.filter((s) => s.methodology === filter.methodology);
    }

    const sorted = [...sessions].sort((a, b) => startedAtMs(b) - startedAtMs(a));
    return filter.limit !== undefined ? sorted.slice(0, filter.limit) : sorted;
  }

  find(sessionId: string): SessionRecord {
    const record = this.store.load().sessions.find((s) => s.id === sessionId);
    if (!record) throw new SessionNotFoundError(sessionId);
    return record;
  }

  /** transcript 存在且 page = true 時交給 pager 顯示 */
  async show(sessionId: string, options: { page: boolean }): Promise<ShowResult> {
    const record = this.find(sessionId);
    const transcriptExists = fs.existsSync(record.log_file);

    if (transcriptExists && options.page) {
      await this.pager.page(record.log_file);
    }
    return { record, transcriptExists };
  }

  history(count: number): Promise<string | null> {
    return this.vcs.history(this.logsDir, count);
  }
}
