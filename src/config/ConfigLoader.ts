import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { DevLogConfig, PartialConfig } from './types.js';
import { InvalidConfigError } from '../domain/errors/DomainErrors.js';
import { LOG_LEVELS, isLogLevel } from '../shared/Logger.js';

export type { DevLogConfig } from './types.js';

const commandSection = z.object({ command: z.string() }).partial();

/** 設定檔 schema：所有欄位皆可省略 */
const FileConfigSchema = z.object({
  version: z.number(),
  logsDir: z.string(),
  metadataFileName: z.string(),
  assistant: commandSection,
  capture: commandSection,
  pager: commandSection,
  git: z.object({
    command: z.string(),
    initMessage: z.string(),
    historyLimit: z.number(),
  }).partial(),
  lock: z.object({
    enabled: z.boolean(),
    retries: z.number(),
    baseDelayMs: z.number(),
    staleMs: z.number(),
  }).partial(),
  logLevel: z.enum(LOG_LEVELS),
}).partial();

/** 合併：partial 覆蓋 base（巢狀區段逐欄位覆蓋） */
function merge(base: DevLogConfig, partial: PartialConfig): DevLogConfig {
  return {
    version: partial.version ?? base.version,
    logsDir: partial.logsDir ?? base.logsDir,
    metadataFileName: partial.metadataFileName ?? base.metadataFileName,
    assistant: { ...base.assistant, ...partial.assistant },
    capture: { ...base.capture, ...partial.capture },
    pager: { ...base.pager, ...partial.pager },
    git: { ...base.git, ...partial.git },
    lock: { ...base.lock, ...partial.lock },
    logLevel: partial.logLevel ?? base.logLevel,
  };
}

/** 環境變數覆蓋：DEVLOG_LOGS_DIR、DEVLOG_LOG_LEVEL、PAGER */
function applyEnvOverrides(config: DevLogConfig): void {
  const logsDir = process.env.DEVLOG_LOGS_DIR;
  if (logsDir) config.logsDir = logsDir;

  const level = process.env.DEVLOG_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new InvalidConfigError(`DEVLOG_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.logLevel = level;
  }

  const pager = process.env.PAGER;
  if (pager) config.pager.command = pager;
}

/** 驗證設定值的合法性 */
function validate(config: DevLogConfig): void {
  const commands: Array<[string, string]> = [
    ['assistant.command', config.assistant.command],
    ['capture.command', config.capture.command],
    ['pager.command', config.pager.command],
    ['git.command', config.git.command],
  ];
  for (const [name, value] of commands) {
    if (!value.trim()) throw new InvalidConfigError(`${name} must not be empty`);
  }

  if (!config.metadataFileName.trim() || config.metadataFileName.includes(path.sep)) {
    throw new InvalidConfigError('metadataFileName must be a plain file name');
  }
  if (!Number.isInteger(config.git.historyLimit) || config.git.historyLimit <= 0) {
    throw new InvalidConfigError('git.historyLimit must be a positive integer');
  }
  if (!Number.isInteger(config.lock.retries) || config.lock.retries < 0) {
    throw new InvalidConfigError('lock.retries must be a non-negative integer');
  }
  if (config.lock.baseDelayMs < 0 || config.lock.staleMs <= 0) {
    throw new InvalidConfigError('lock delays must be positive');
  }
}

function readFileConfig(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigError(`${configPath} is not valid JSON`, { cause: err });
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidConfigError(`${configPath}: ${issue.path.join('.')} ${issue.message}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 ~/.devlog.json（若存在）並合併到預設值上
 * @param homeDir - 使用者 home 目錄，相對的 logsDir 以此解析
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(homeDir: string, overrides?: PartialConfig): DevLogConfig {
  const fileConfig = readFileConfig(path.join(homeDir, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides < env
  let merged = merge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = merge(merged, overrides);
  }

  applyEnvOverrides(merged);
  validate(merged);

  merged.logsDir = path.resolve(homeDir, merged.logsDir);
  return merged;
}
