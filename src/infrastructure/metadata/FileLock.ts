import fs from 'node:fs';
import { MetadataLockedError } from '../../domain/errors/DomainErrors.js';

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Advisory lock：以 exclusive create 建立 lock 檔
 *
 * 只對同樣遵守此 lock 的 devlog 程序有效。lock 檔的 mtime 超過 staleMs
 * 視為前一個程序異常結束後的殘留，直接接管。
 */
export class FileLock {
  constructor(
    private readonly lockPath: string,
    private readonly staleMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** 取得 lock；被占用時拋出 MetadataLockedError */
  acquire(): void {
    if (this.tryCreate()) return;

    if (this.isStale()) {
      this.removeQuietly();
      if (this.tryCreate()) return;
    }
    throw new MetadataLockedError(this.lockPath);
  }

  release(): void {
    this.removeQuietly();
  }

  private tryCreate(): boolean {
    try {
      fs.writeFileSync(this.lockPath, String(process.pid), { flag: 'wx' });
      return true;
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) return false;
      throw err;
    }
  }

  private isStale(): boolean {
    try {
      const { mtimeMs } = fs.statSync(this.lockPath);
      return this.now() - mtimeMs > this.staleMs;
    } catch (err) {
      // 另一個程序剛好釋放
      if (hasErrorCode(err, 'ENOENT')) return true;
      throw err;
    }
  }

  private removeQuietly(): void {
    try {
      fs.unlinkSync(this.lockPath);
    } catch (err) {
      if (!hasErrorCode(err, 'ENOENT')) throw err;
    }
  }
}
