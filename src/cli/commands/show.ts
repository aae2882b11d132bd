import fs from 'node:fs';
import type { Command } from 'commander';
import { SessionCatalogUseCase } from '../../application/SessionCatalogUseCase.js';
import { CommandPagerAdapter } from '../../infrastructure/process/CommandPagerAdapter.js';
import { SessionFormatter } from '../formatters/SessionFormatter.js';
import { createRuntime } from './runtime.js';

interface ShowOptions {
  pager: boolean;
}

/** 註冊 show 指令：印出摘要後以 pager 顯示 transcript */
export function registerShowCommand(program: Command): void {
  program
    .command('show <sessionId>')
    .description('Show a logged session transcript')
    .option('--no-pager', 'Print the transcript to stdout instead of paging it')
    .action(async (sessionId: string, opts: ShowOptions) => {
      const { config, logger, store, vcs } = createRuntime();
      const catalog = new SessionCatalogUseCase(
        store,
        vcs,
        new CommandPagerAdapter(config.pager.command, logger.child('pager')),
        config.logsDir,
      );

      const record = catalog.find(sessionId);
      process.stdout.write(new SessionFormatter().formatSessionDetail(record) + '\n\n--- Log Content ---\n\n');

      const { transcriptExists } = await catalog.show(sessionId, { page: opts.pager });
      if (!transcriptExists) {
        process.stderr.write(`Log file not found: ${record.log_file}\n`);
        process.exitCode = 1;
        return;
      }

      if (!opts.pager) {
        process.stdout.write(fs.readFileSync(record.log_file, 'utf-8'));
      }
    });
}
