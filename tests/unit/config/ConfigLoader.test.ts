import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loadConfig } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  let homeDir: string;

  beforeEach(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devlog-config-'));
    vi.stubEnv('DEVLOG_LOGS_DIR', '');
    vi.stubEnv('DEVLOG_LOG_LEVEL', '');
    vi.stubEnv('PAGER', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it('should return default config when no file exists', () => {
    const config = loadConfig(homeDir);
    expect(config.logsDir).toBe(path.join(homeDir, '.claude-logs'));
    expect(config.metadataFileName).toBe('sessions_metadata.json');
    expect(config.assistant.command).toBe('claude');
    expect(config.capture.command).toBe('script');
    expect(config.pager.command).toBe('less');
    expect(config.git.initMessage).toBe('Initialize Claude conversation logs');
    expect(config.git.historyLimit).toBe(20);
    expect(config.logLevel).toBe('warn');
  });

  it('should merge the config file over defaults', () => {
    fs.writeFileSync(
      path.join(homeDir, '.devlog.json'),
      JSON.stringify({ logsDir: 'logs', git: { historyLimit: 5 } }),
    );
    const config = loadConfig(homeDir);
    expect(config.logsDir).toBe(path.join(homeDir, 'logs'));
    expect(config.git.historyLimit).toBe(5);
    // 其他欄位仍用 defaults
    expect(config.git.command).toBe('git');
  });

  it('should apply overrides after the file', () => {
    fs.writeFileSync(path.join(homeDir, '.devlog.json'), JSON.stringify({ pager: { command: 'more' } }));
    const config = loadConfig(homeDir, { pager: { command: 'most' } });
    expect(config.pager.command).toBe('most');
  });

  it('should apply environment variables last', () => {
    vi.stubEnv('DEVLOG_LOGS_DIR', '/var/devlog');
    vi.stubEnv('DEVLOG_LOG_LEVEL', 'debug');
    vi.stubEnv('PAGER', 'less -R');

    const config = loadConfig(homeDir, { logsDir: 'ignored' });
    expect(config.logsDir).toBe('/var/devlog');
    expect(config.logLevel).toBe('debug');
    expect(config.pager.command).toBe('less -R');
  });

  it('should reject an unknown log level from the environment', () => {
    vi.stubEnv('DEVLOG_LOG_LEVEL', 'verbose');
    expect(() => loadConfig(homeDir)).toThrow('DEVLOG_LOG_LEVEL must be one of debug, info, warn, error');
  });

  it('should reject invalid JSON', () => {
    const file = path.join(homeDir, '.devlog.json');
    fs.writeFileSync(file, '{ nope');
    expect(() => loadConfig(homeDir)).toThrow(`${file} is not valid JSON`);
  });

  it('should reject wrongly typed fields', () => {
    fs.writeFileSync(path.join(homeDir, '.devlog.json'), JSON.stringify({ git: { historyLimit: 'ten' } }));
    expect(() => loadConfig(homeDir)).toThrow('git.historyLimit');
  });

  it('should validate historyLimit is a positive integer', () => {
    expect(() => loadConfig(homeDir, { git: { historyLimit: 0 } }))
      .toThrow('git.historyLimit must be a positive integer');
  });

  it('should reject empty command names', () => {
    expect(() => loadConfig(homeDir, { assistant: { command: '  ' } }))
      .toThrow('assistant.command must not be empty');
  });

  it('should reject a metadata file name with a directory', () => {
    expect(() => loadConfig(homeDir, { metadataFileName: path.join('a', 'b.json') }))
      .toThrow('metadataFileName must be a plain file name');
  });
});
