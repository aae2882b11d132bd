import type { Command } from 'commander';
import { SessionRecorderUseCase } from '../../application/SessionRecorderUseCase.js';
import { ScriptCaptureAdapter } from '../../infrastructure/process/ScriptCaptureAdapter.js';
import { ClackEnergyPrompt } from '../../infrastructure/prompt/ClackEnergyPrompt.js';
import { SessionFormatter } from '../formatters/SessionFormatter.js';
import { createRuntime } from './runtime.js';

interface RecordOptions {
  trackEnergy?: boolean;
}

/**
 * 預設動作：以紀錄模式執行 assistant
 *
 * 未知的選項與其後所有參數原樣轉交給 assistant，
 * 行程結束碼與 assistant 一致（中斷時為 130）。
 */
export function registerRecordCommand(program: Command): void {
  program
    .enablePositionalOptions()
    .passThroughOptions()
    .allowUnknownOption()
    .argument('[assistantArgs...]', 'Arguments passed through to the assistant')
    .option('-e, --track-energy', 'Prompt for creative energy level after the session')
    .action(async (assistantArgs: string[], opts: RecordOptions) => {
      const { config, logger, store, vcs } = createRuntime();

      if (await vcs.ensureRepository(config.logsDir)) {
        process.stderr.write('🔧 Initialized git repository for conversation logs\n');
      }

      const recorder = new SessionRecorderUseCase(
        {
          logsDir: config.logsDir,
          metadataFile: store.filePath,
          assistantCommand: config.assistant.command,
        },
        {
          store,
          vcs,
          capture: new ScriptCaptureAdapter({
            scriptCommand: config.capture.command,
            logger: logger.child('capture'),
          }),
          energyPrompt: new ClackEnergyPrompt(),
          logger: logger.child('recorder'),
        },
      );

      const result = await recorder.run({
        projectDir: process.cwd(),
        assistantArgs,
        trackEnergy: opts.trackEnergy ?? false,
      });

      process.stdout.write('\n' + new SessionFormatter().formatRunSummary(result) + '\n');
      process.exitCode = result.exitCode;
    });
}
