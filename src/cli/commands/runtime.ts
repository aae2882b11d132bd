import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, type DevLogConfig } from '../../config/ConfigLoader.js';
import { LogDirectoryUnavailableError } from '../../domain/errors/DomainErrors.js';
import { JsonMetadataStore } from '../../infrastructure/metadata/JsonMetadataStore.js';
import { GitCliAdapter } from '../../infrastructure/vcs/GitCliAdapter.js';
import { Logger } from '../../shared/Logger.js';

/** 各指令共用的依賴 */
export interface Runtime {
  config: DevLogConfig;
  logger: Logger;
  store: JsonMetadataStore;
  vcs: GitCliAdapter;
}

/** 載入設定並確保 log 目錄存在 */
export function createRuntime(homeDir: string = os.homedir()): Runtime {
  const config = loadConfig(homeDir);
  const logger = new Logger('devlog', config.logLevel);

  try {
    fs.mkdirSync(config.logsDir, { recursive: true });
  } catch (err) {
    throw new LogDirectoryUnavailableError(config.logsDir, { cause: err });
  }

  const store = new JsonMetadataStore({
    filePath: path.join(config.logsDir, config.metadataFileName),
    logger: logger.child('metadata'),
    lock: config.lock.enabled ? config.lock : undefined,
  });

  const vcs = new GitCliAdapter({
    command: config.git.command,
    initMessage: config.git.initMessage,
    logger: logger.child('git'),
  });

  return { config, logger, store, vcs };
}
