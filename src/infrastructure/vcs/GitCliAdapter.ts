import fs from 'node:fs';
import path from 'node:path';
import type { VersionControlPort } from '../../domain/ports/VersionControlPort.js';
import { VersionControlError } from '../../domain/errors/DomainErrors.js';
import type { Logger } from '../../shared/Logger.js';
import { execaRunner, type CommandRunner, type CommandResult } from '../process/CommandRunner.js';

export const GITIGNORE_CONTENT = [
  '# Temporary files',
  '*.tmp',
  '*.swp',
  '*.lock',
  '.DS_Store',
  '',
].join('\n');

export interface GitCliOptions {
  command: string;
  initMessage: string;
  logger: Logger;
  runner?: CommandRunner;
}

/**
 * 以 git CLI 保存 transcript 歷史
 *
 * 所有失敗都降級為 warn：log 已寫到磁碟，只是沒有進版控。
 * git 指令沒有 timeout，卡住的 git 會讓呼叫端一直等待。
 */
export class GitCliAdapter implements VersionControlPort {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: GitCliOptions) {
    this.runner = opts.runner ?? execaRunner;
  }

  async ensureRepository(dir: string): Promise<boolean> {
    if (fs.existsSync(path.join(dir, '.git'))) return false;

    try {
      await this.git(dir, ['init']);
    } catch (err) {
      this.degrade('init', err);
      return false;
    }

    try {
      fs.writeFileSync(path.join(dir, '.gitignore'), GITIGNORE_CONTENT, 'utf-8');
      await this.git(dir, ['add', '.']);
      await this.git(dir, ['commit', '-m', this.opts.initMessage]);
    } catch (err) {
      this.degrade('initial commit', err);
    }
    return true;
  }

  async commit(dir: string, files: string[], message: string): Promise<string | null> {
    try {
      await this.git(dir, ['add', '--', ...files]);
      await this.git(dir, ['commit', '-m', message]);
      const { stdout } = await this.git(dir, ['rev-parse', '--short', 'HEAD']);
      const hash = stdout.split('\n')[0].trim();
      return hash || null;
    } catch (err) {
      this.degrade('commit', err);
      return null;
    }
  }

  async history(dir: string, count: number): Promise<string | null> {
    try {
      const { stdout } = await this.git(dir, [
        'log',
        '--pretty=format:%h - %ad - %s',
        '--date=relative',
        `-${count}`,
      ]);
      return stdout;
    } catch (err) {
      this.degrade('log', err);
      return null;
    }
  }

  /** 執行 git 子指令；非零結束碼轉為 VersionControlError */
  private async git(dir: string, args: string[]): Promise<CommandResult> {
    const result = await this.runner(this.opts.command, args, { cwd: dir });
    if (result.exitCode !== 0) {
      throw new VersionControlError(args[0], result.exitCode, result.stderr.trim() || 'no output');
    }
    return result;
  }

  private degrade(step: string, err: unknown): void {
    if (!(err instanceof VersionControlError)) throw err;
    this.opts.logger.warn(`git ${step} failed, continuing without version control`, {
      code: err.code,
      exitCode: err.exitCode,
      message: err.message,
    });
  }
}
