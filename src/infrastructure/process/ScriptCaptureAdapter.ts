import type { EventEmitter } from 'node:events';
import type { CaptureRequest, TranscriptCapturePort } from '../../domain/ports/TranscriptCapturePort.js';
import type { ExecutionOutcome } from '../../domain/value-objects/ExecutionOutcome.js';
import type { Logger } from '../../shared/Logger.js';
import { execaRunner, type CommandRunner } from './CommandRunner.js';

/** 指令找不到 / 無法啟動時回報的結束碼（沿用 shell 慣例） */
export const LAUNCH_FAILED_EXIT_CODE = 127;

/**
 * 組出 script(1) 參數
 * - util-linux：script -q -a <file> -c "<command line>"
 * - BSD / macOS：script -q -a <file> <command> [args...]
 */
export function buildScriptArgs(platform: NodeJS.Platform, request: CaptureRequest): string[] {
  if (platform === 'darwin' || platform === 'freebsd' || platform === 'openbsd') {
    return ['-q', '-a', request.logFile, request.command, ...request.args];
  }
  return ['-q', '-a', request.logFile, '-c', request.commandLine];
}

export interface ScriptCaptureOptions {
  scriptCommand: string;
  logger: Logger;
  runner?: CommandRunner;
  /** SIGINT 來源，預設為 process */
  signals?: Pick<EventEmitter, 'on' | 'off'>;
  platform?: NodeJS.Platform;
}

/**
 * 透過 script(1) 執行 assistant，終端 I/O 原樣 append 到 transcript
 *
 * 執行期間攔截 SIGINT，避免 Node 直接結束而跳過收尾；
 * 收到 SIGINT 即視為 interrupted。
 */
export class ScriptCaptureAdapter implements TranscriptCapturePort {
  private readonly runner: CommandRunner;
  private readonly signals: Pick<EventEmitter, 'on' | 'off'>;
  private readonly platform: NodeJS.Platform;

  constructor(private readonly opts: ScriptCaptureOptions) {
    this.runner = opts.runner ?? execaRunner;
    this.signals = opts.signals ?? process;
    this.platform = opts.platform ?? process.platform;
  }

  async run(request: CaptureRequest): Promise<ExecutionOutcome> {
    let interrupted = false;
    const onInterrupt = (): void => {
      interrupted = true;
    };

    this.signals.on('SIGINT', onInterrupt);
    try {
      const args = buildScriptArgs(this.platform, request);
      this.opts.logger.debug('Starting transcript capture', { command: this.opts.scriptCommand, args });

      const result = await this.runner(this.opts.scriptCommand, args, {
        cwd: request.cwd,
        interactive: true,
      });

      if (interrupted || result.signal === 'SIGINT') {
        return { kind: 'interrupted' };
      }
      if (result.exitCode === undefined) {
        this.opts.logger.error('Transcript capture did not start', {
          command: this.opts.scriptCommand,
          signal: result.signal,
        });
        return { kind: 'exited', exitCode: LAUNCH_FAILED_EXIT_CODE };
      }
      return { kind: 'exited', exitCode: result.exitCode };
    } finally {
      this.signals.off('SIGINT', onInterrupt);
    }
  }
}
