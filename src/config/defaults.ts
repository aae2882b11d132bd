import type { DevLogConfig } from './types.js';

export const CONFIG_FILE_NAME = '.devlog.json';

export const DEFAULT_CONFIG: DevLogConfig = {
  version: 1,
  logsDir: '.claude-logs',
  metadataFileName: 'sessions_metadata.json',
  assistant: { command: 'claude' },
  capture: { command: 'script' },
  pager: { command: 'less' },
  git: {
    command: 'git',
    initMessage: 'Initialize Claude conversation logs',
    historyLimit: 20,
  },
  lock: {
    enabled: true,
    retries: 5,
    baseDelayMs: 100,
    staleMs: 60_000, // 1 分鐘
  },
  logLevel: 'warn',
};
