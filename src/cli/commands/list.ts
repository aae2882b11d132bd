import type { Command } from 'commander';
import { SessionCatalogUseCase } from '../../application/SessionCatalogUseCase.js';
import type { Methodology } from '../../domain/entities/SessionRecord.js';
import { CommandPagerAdapter } from '../../infrastructure/process/CommandPagerAdapter.js';
import { SessionFormatter, type OutputFormat } from '../formatters/SessionFormatter.js';
import { parseFormat, parseMethodology, parsePositiveInt } from './options.js';
import { createRuntime } from './runtime.js';

interface ListOptions {
  methodology?: Methodology;
  limit?: number;
  format: OutputFormat;
}

/** 註冊 list 指令 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List logged sessions, newest first')
    .option('--methodology <methodology>', 'Filter by methodology', parseMethodology)
    .option('--limit <number>', 'Maximum number of sessions', parsePositiveInt)
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: ListOptions) => {
      const { config, logger, store, vcs } = createRuntime();
      const catalog = new SessionCatalogUseCase(
        store,
        vcs,
        new CommandPagerAdapter(config.pager.command, logger.child('pager')),
        config.logsDir,
      );

      const sessions = catalog.list({ methodology: opts.methodology, limit: opts.limit });
      process.stdout.write(new SessionFormatter().formatSessionList(sessions, opts.format) + '\n');
    });
}
