import fs from 'node:fs';
import path from 'node:path';
import type { SessionRecord } from '../domain/entities/SessionRecord.js';
import type { MetadataStorePort } from '../domain/ports/MetadataStorePort.js';
import type { VersionControlPort } from '../domain/ports/VersionControlPort.js';
import type { TranscriptCapturePort } from '../domain/ports/TranscriptCapturePort.js';
import type { EnergyPromptPort } from '../domain/ports/EnergyPromptPort.js';
import { LogDirectoryUnavailableError } from '../domain/errors/DomainErrors.js';
import { exitCodeOf, type ExecutionOutcome } from '../domain/value-objects/ExecutionOutcome.js';
import { formatSessionId, reconstructCommand, transcriptFileName } from '../domain/value-objects/SessionNaming.js';
import { formatTranscriptFooter, formatTranscriptHeader } from '../domain/value-objects/TranscriptFrame.js';
import { formatCommitMessage } from '../domain/value-objects/CommitMessage.js';
import { parseEnergy } from '../domain/value-objects/CreativeEnergy.js';
import { detectMethodology } from '../infrastructure/project/MethodologyDetector.js';
import type { Logger } from '../shared/Logger.js';
import type { SessionRunRequest } from './dto/SessionRunRequest.js';
import type { FinalizationStep, FinalizationStepName, SessionRunResult } from './dto/SessionRunResult.js';

export interface SessionRecorderSettings {
  logsDir: string;
  /** sessions_metadata.json 的絕對路徑（需位於 logsDir 內） */
  metadataFile: string;
  /** assistant 執行檔，例如 claude */
  assistantCommand: string;
}

export interface SessionRecorderDeps {
  store: MetadataStorePort;
  vcs: VersionControlPort;
  capture: TranscriptCapturePort;
  /** 未提供時即使要求追蹤也不詢問 energy */
  energyPrompt?: EnergyPromptPort;
  logger: Logger;
  clock?: () => Date;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Session 紀錄用例：一次 assistant session 從啟動到 commit 的完整生命週期
 *
 * 命名 → 寫 transcript header → 委派執行 → finalize。
 * finalize 依序執行 footer → energy → metadata → commit，
 * 不論 assistant 如何結束、前一步是否失敗，每一步都會執行。
 */
export class SessionRecorderUseCase {
  private readonly clock: () => Date;

  constructor(
    private readonly settings: SessionRecorderSettings,
    private readonly deps: SessionRecorderDeps,
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** 建立尚未開始的 session 紀錄（僅記憶體內） */
  createSession(request: SessionRunRequest): SessionRecord {
    const startedAt = this.clock();
    const id = formatSessionId(startedAt);
    const workingDirectory = path.resolve(request.projectDir);
    const project = path.basename(workingDirectory);
    const methodology = detectMethodology(workingDirectory);

    return {
      id,
      timestamp: startedAt.toISOString(),
      project,
      methodology,
      working_directory: workingDirectory,
      command: reconstructCommand(this.settings.assistantCommand, request.assistantArgs),
      log_file: path.join(this.settings.logsDir, transcriptFileName(project, methodology, id)),
      duration: null,
      end_time: null,
      features_worked_on: [],
      creative_energy: null,
    };
  }

  async run(request: SessionRunRequest): Promise<SessionRunResult> {
    // metadata 損毀時在啟動 assistant 前就失敗，否則這次的紀錄會在收尾時遺失
    this.deps.store.load();

    const record = this.createSession(request);
    this.writeHeader(record);

    const startedAt = this.clock();
    let outcome: ExecutionOutcome;
    try {
      outcome = await this.deps.capture.run({
        command: this.settings.assistantCommand,
        args: request.assistantArgs,
        commandLine: record.command,
        logFile: record.log_file,
        cwd: record.working_directory,
      });
    } catch (err) {
      this.deps.logger.error('Transcript capture failed', { sessionId: record.id, error: errorMessage(err) });
      outcome = { kind: 'exited', exitCode: 1 };
    }

    return this.finalize(record, outcome, startedAt, request.trackEnergy);
  }

  /**
   * 收尾：不論 outcome 為何都完整執行
   * 每一步的失敗只記錄在 steps，不中斷後續步驟
   */
  async finalize(
    record: SessionRecord,
    outcome: ExecutionOutcome,
    startedAt: Date,
    trackEnergy: boolean,
  ): Promise<SessionRunResult> {
    const steps: FinalizationStep[] = [];
    const endedAt = this.clock();
    const duration = Math.max(0, (endedAt.getTime() - startedAt.getTime()) / 1000);
    // 同一毫秒內結束時 end_time 往後推 1ms，維持嚴格晚於 timestamp
    const endTime = new Date(Math.max(endedAt.getTime(), Date.parse(record.timestamp) + 1)).toISOString();

    let finalized: SessionRecord = { ...record, duration, end_time: endTime };

    await this.step(steps, 'footer', () => {
      fs.appendFileSync(record.log_file, formatTranscriptFooter(endTime, duration), 'utf-8');
    });

    if (trackEnergy) {
      const energy = await this.step(steps, 'energy', () => this.captureEnergy());
      finalized = { ...finalized, creative_energy: energy ?? null };
    }

    await this.step(steps, 'metadata', () => this.deps.store.append(finalized));

    const commitId = await this.step(steps, 'commit', () =>
      this.deps.vcs.commit(
        this.settings.logsDir,
        [path.basename(finalized.log_file), path.basename(this.settings.metadataFile)],
        formatCommitMessage(finalized),
      ),
    );
    if (commitId === null) {
      markDegraded(steps, 'commit');
    }

    return {
      record: finalized,
      outcome,
      exitCode: exitCodeOf(outcome),
      commitId: commitId ?? null,
      steps,
    };
  }

  /**
   * 反覆詢問直到輸入 1、2 或 3
   * 使用者中斷時放棄，回傳 null（不視為錯誤）
   */
  async captureEnergy(): Promise<number | null> {
    const prompt = this.deps.energyPrompt;
    if (!prompt) {
      this.deps.logger.warn('Energy tracking requested but no prompt is available');
      return null;
    }

    for (let attempt = 1; ; attempt++) {
      const answer = await prompt.ask(attempt);
      if (answer === null) return null;

      const level = parseEnergy(answer);
      if (level !== null) return level;
    }
  }

  private writeHeader(record: SessionRecord): void {
    try {
      fs.mkdirSync(this.settings.logsDir, { recursive: true });
      fs.writeFileSync(record.log_file, formatTranscriptHeader(record), 'utf-8');
    } catch (err) {
      throw new LogDirectoryUnavailableError(this.settings.logsDir, { cause: err });
    }
  }

  /** 執行單一收尾步驟；失敗時記錄並回傳 undefined */
  private async step<T>(
    steps: FinalizationStep[],
    name: FinalizationStepName,
    action: () => T | Promise<T>,
  ): Promise<T | undefined> {
    try {
      const value = await action();
      steps.push({ name, status: 'ok' });
      return value;
    } catch (err) {
      const error = errorMessage(err);
      this.deps.logger.error(`Session finalization step "${name}" failed`, { error });
      steps.push({ name, status: 'failed', error });
      return undefined;
    }
  }
}

function markDegraded(steps: FinalizationStep[], name: FinalizationStepName): void {
  const step = steps.find((s) => s.name === name);
  if (step?.status === 'ok') step.status = 'degraded';
}
