import fs from 'node:fs';
import path from 'node:path';
import type { MetadataDocument, SessionRecord } from '../../domain/entities/SessionRecord.js';
import type {
  LoadedMetadata,
  MetadataStorePort,
  QuarantinedEntry,
} from '../../domain/ports/MetadataStorePort.js';
import { MetadataCorruptError, MetadataLockedError } from '../../domain/errors/DomainErrors.js';
import type { LockConfig } from '../../config/types.js';
import type { Logger } from '../../shared/Logger.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { FileLock } from './FileLock.js';
import { SessionRecordSchema, describeIssues } from './SessionRecordSchema.js';

export interface JsonMetadataStoreOptions {
  filePath: string;
  logger: Logger;
  /** 未提供時不上 lock */
  lock?: LockConfig;
  sleep?: (ms: number) => Promise<void>;
}

/** 磁碟上的原始文件：sessions 之外的欄位原樣保留 */
interface RawDocument {
  [key: string]: unknown;
  sessions: unknown[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * sessions_metadata.json 的讀寫
 *
 * - load：逐筆以 schema 驗證，不合格的項目隔離（不回傳，但保留在檔案中）
 * - save：pretty-print 後以 temp file + rename 原子寫入
 * - append：lock → 重新讀取 → 附加 → 寫回，縮小並行 session 的 lost update
 */
export class JsonMetadataStore implements MetadataStorePort {
  constructor(private readonly opts: JsonMetadataStoreOptions) {}

  get filePath(): string {
    return this.opts.filePath;
  }

  load(): LoadedMetadata {
    const raw = this.readRaw();
    const sessions: SessionRecord[] = [];
    const quarantined: QuarantinedEntry[] = [];

    raw.sessions.forEach((entry, index) => {
      const parsed = SessionRecordSchema.safeParse(entry);
      if (parsed.success) {
        sessions.push(parsed.data);
      } else {
        quarantined.push({ index, reason: describeIssues(parsed.error), raw: entry });
      }
    });

    if (quarantined.length > 0) {
      this.opts.logger.warn('Quarantined malformed session entries', {
        file: this.opts.filePath,
        count: quarantined.length,
        indexes: quarantined.map((q) => q.index),
      });
    }

    return { sessions, quarantined };
  }

  save(document: MetadataDocument): void {
    this.writeAtomic({ sessions: document.sessions });
  }

  async append(record: SessionRecord): Promise<void> {
    const lockConfig = this.opts.lock;
    if (!lockConfig?.enabled) {
      this.appendUnlocked(record);
      return;
    }

    const lock = new FileLock(`${this.opts.filePath}.lock`, lockConfig.staleMs);
    await withRetry(() => lock.acquire(), {
      maxRetries: lockConfig.retries,
      baseDelayMs: lockConfig.baseDelayMs,
      isRetryable: (err) => err instanceof MetadataLockedError,
      onRetry: (attempt) => this.opts.logger.warn('Metadata lock busy, retrying', { attempt }),
      sleep: this.opts.sleep,
    });

    try {
      this.appendUnlocked(record);
    } finally {
      lock.release();
    }
  }

  private appendUnlocked(record: SessionRecord): void {
    const raw = this.readRaw();
    this.writeAtomic({ ...raw, sessions: [...raw.sessions, record] });
  }

  /** 讀取原始文件；檔案不存在回傳空文件，格式錯誤為 fatal */
  private readRaw(): RawDocument {
    const file = this.opts.filePath;
    if (!fs.existsSync(file)) return { sessions: [] };

    let text: string;
    try {
      text = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      throw new MetadataCorruptError(file, 'cannot be read', { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new MetadataCorruptError(file, 'not valid JSON', { cause: err });
    }

    if (!isObject(json)) {
      throw new MetadataCorruptError(file, 'top-level value must be an object');
    }
    const sessions = json.sessions;
    if (!Array.isArray(sessions)) {
      throw new MetadataCorruptError(file, '"sessions" must be an array');
    }
    return { ...json, sessions };
  }

  private writeAtomic(document: RawDocument): void {
    const file = this.opts.filePath;
    fs.mkdirSync(path.dirname(file), { recursive: true });

    const tmp = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(document, null, 2), 'utf-8');
    fs.renameSync(tmp, file);
  }
}
