#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { registerRecordCommand } from './commands/record.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerListCommand } from './commands/list.js';
import { registerShowCommand } from './commands/show.js';
import { registerHistoryCommand } from './commands/history.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

const program = new Command();

program
  .name('devlog')
  .description('Run the Claude CLI with conversation logging, git history and session analysis')
  .version(version)
  // 需在建立子指令前設定，子指令才會繼承
  .exitOverride();

registerRecordCommand(program);
registerAnalyzeCommand(program);
registerListCommand(program);
registerShowCommand(program);
registerHistoryCommand(program);

/** 全域錯誤處理 */
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // commander 已自行輸出 help / version / 用法錯誤
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
