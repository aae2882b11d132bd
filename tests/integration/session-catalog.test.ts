import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { SessionCatalogUseCase } from '../../src/application/SessionCatalogUseCase.js';
import { JsonMetadataStore } from '../../src/infrastructure/metadata/JsonMetadataStore.js';
import { SessionNotFoundError } from '../../src/domain/errors/DomainErrors.js';
import type { PagerPort } from '../../src/domain/ports/PagerPort.js';
import type { VersionControlPort } from '../../src/domain/ports/VersionControlPort.js';
import { makeRecord, memoryLogger } from './fixtures.js';

class RecordingPager implements PagerPort {
  paged: string[] = [];
  async page(filePath: string): Promise<void> {
    this.paged.push(filePath);
  }
}

const vcs: VersionControlPort = {
  ensureRepository: async () => false,
  commit: async () => null,
  history: async (_dir, count) => `${count} commits`,
};

describe('SessionCatalogUseCase', () => {
  let dir: string;
  let pager: RecordingPager;
  let catalog: SessionCatalogUseCase;
  let transcript: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'devlog-catalog-'));
    transcript = path.join(dir, 'b.log');
    fs.writeFileSync(transcript, 'Human: hi\n');

    const store = new JsonMetadataStore({
      filePath: path.join(dir, 'sessions_metadata.json'),
      logger: memoryLogger().logger,
    });
    store.save({
      sessions: [
        makeRecord({ id: 'a', timestamp: '2024-01-01T10:00:00.000Z', log_file: path.join(dir, 'a.log') }),
        makeRecord({ id: 'b', timestamp: '2024-01-03T10:00:00.000Z', methodology: 'command-based', log_file: transcript }),
        makeRecord({ id: 'c', timestamp: '2024-01-02T10:00:00.000Z' }),
      ],
    });

    pager = new RecordingPager();
    catalog = new SessionCatalogUseCase(store, vcs, pager, dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should list newest first', () => {
    expect(catalog.list().map((s) => s.id)).toEqual(['b', 'c', 'a']);
  });

  it('should filter and limit', () => {
    expect(catalog.list({ methodology: 'context-driven' }).map((s) => s.id)).toEqual(['c', 'a']);
    expect(catalog.list({ limit: 1 }).map((s) => s.id)).toEqual(['b']);
  });

  it('should find a session or throw', () => {
    expect(catalog.find('c').timestamp).toBe('2024-01-02T10:00:00.000Z');
    expect(() => catalog.find('zzz')).toThrow(SessionNotFoundError);
  });

  it('should page an existing transcript', async () => {
    const result = await catalog.show('b', { page: true });

    expect(result.transcriptExists).toBe(true);
    expect(pager.paged).toEqual([transcript]);
  });

  it('should not page when asked not to', async () => {
    await catalog.show('b', { page: false });
    expect(pager.paged).toEqual([]);
  });

  it('should report a missing transcript without paging', async () => {
    const result = await catalog.show('a', { page: true });

    expect(result.transcriptExists).toBe(false);
    expect(pager.paged).toEqual([]);
  });

  it('should delegate history to version control', async () => {
    expect(await catalog.history(7)).toBe('7 commits');
  });
});
