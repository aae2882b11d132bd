import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { FileLock } from '../../../src/infrastructure/metadata/FileLock.js';
import { MetadataLockedError } from '../../../src/domain/errors/DomainErrors.js';

describe('FileLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'devlog-lock-'));
    lockPath = path.join(dir, 'sessions_metadata.json.lock');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates and removes the lock file', () => {
    const lock = new FileLock(lockPath, 60_000);
    lock.acquire();
    expect(fs.existsSync(lockPath)).toBe(true);
    lock.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('throws MetadataLockedError while another holder has it', () => {
    new FileLock(lockPath, 60_000).acquire();
    expect(() => new FileLock(lockPath, 60_000).acquire()).toThrow(MetadataLockedError);
  });

  it('takes over a stale lock', () => {
    fs.writeFileSync(lockPath, '999999');
    const { mtimeMs } = fs.statSync(lockPath);
    const lock = new FileLock(lockPath, 1_000, () => mtimeMs + 5_000);

    expect(() => lock.acquire()).not.toThrow();
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe(String(process.pid));
  });

  it('release is a no-op without a lock file', () => {
    expect(() => new FileLock(lockPath, 1_000).release()).not.toThrow();
  });
});
