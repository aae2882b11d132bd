import type { Command } from 'commander';
import { SessionCatalogUseCase } from '../../application/SessionCatalogUseCase.js';
import { CommandPagerAdapter } from '../../infrastructure/process/CommandPagerAdapter.js';
import { parsePositiveInt } from './options.js';
import { createRuntime } from './runtime.js';

interface HistoryOptions {
  count?: number;
}

/** 註冊 git-log 指令 */
export function registerHistoryCommand(program: Command): void {
  program
    .command('git-log')
    .description('Show the git history of the log directory')
    .option('--count <number>', 'Number of commits to show', parsePositiveInt)
    .action(async (opts: HistoryOptions) => {
      const { config, logger, store, vcs } = createRuntime();
      const catalog = new SessionCatalogUseCase(
        store,
        vcs,
        new CommandPagerAdapter(config.pager.command, logger.child('pager')),
        config.logsDir,
      );

      const log = await catalog.history(opts.count ?? config.git.historyLimit);
      if (log === null) {
        process.stderr.write(`Git history unavailable for ${config.logsDir}\n`);
        process.exitCode = 1;
        return;
      }

      process.stdout.write('=== Git History of Claude Sessions ===\n\n' + log + '\n');
    });
}
