import type { PagerPort } from '../../domain/ports/PagerPort.js';
import type { Logger } from '../../shared/Logger.js';
import { execaRunner, type CommandRunner } from './CommandRunner.js';

/** 以外部 pager（less / $PAGER）顯示檔案；pager 指令可帶參數，例如 "less -R" */
export class CommandPagerAdapter implements PagerPort {
  constructor(
    private readonly pagerCommand: string,
    private readonly logger: Logger,
    private readonly runner: CommandRunner = execaRunner,
  ) {}

  async page(filePath: string): Promise<void> {
    const [file, ...args] = this.pagerCommand.trim().split(/\s+/);
    const result = await this.runner(file, [...args, filePath], { interactive: true });
    if (result.exitCode !== 0) {
      this.logger.warn('Pager exited abnormally', { pager: this.pagerCommand, exitCode: result.exitCode });
    }
  }
}
