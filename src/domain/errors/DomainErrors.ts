export type ErrorClassification = 'fatal' | 'degradable' | 'retryable' | 'manual';

/** 所有 devlog domain 錯誤的基底類別 */
export abstract class DevLogError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Fatal ---

export class LogDirectoryUnavailableError extends DevLogError {
  readonly classification = 'fatal' as const;
  readonly code = 'LOG_DIR_UNAVAILABLE';

  constructor(
    public readonly dirPath: string,
    options?: ErrorOptions,
  ) {
    super(`Log directory "${dirPath}" cannot be created or written`, options);
  }
}

export class MetadataCorruptError extends DevLogError {
  readonly classification = 'fatal' as const;
  readonly code = 'METADATA_CORRUPT';

  constructor(
    public readonly filePath: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Metadata file "${filePath}" is unreadable: ${detail}`, options);
  }
}

export class InvalidConfigError extends DevLogError {
  readonly classification = 'fatal' as const;
  readonly code = 'CONFIG_INVALID';
}

// --- Retryable ---

export class MetadataLockedError extends DevLogError {
  readonly classification = 'retryable' as const;
  readonly code = 'METADATA_LOCKED';
  readonly maxRetries = 5;
  readonly baseDelayMs = 100;

  constructor(
    public readonly lockPath: string,
    options?: ErrorOptions,
  ) {
    super(`Metadata is locked by another session (${lockPath})`, options);
  }
}

// --- Degradable ---

export class VersionControlError extends DevLogError {
  readonly classification = 'degradable' as const;
  readonly code = 'VCS_FAILED';

  constructor(
    public readonly subcommand: string,
    public readonly exitCode: number | undefined,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`git ${subcommand} failed (exit ${exitCode ?? 'unknown'}): ${detail}`, options);
  }
}

// --- Manual ---

export class SessionNotFoundError extends DevLogError {
  readonly classification = 'manual' as const;
  readonly code = 'SESSION_NOT_FOUND';

  constructor(
    public readonly sessionId: string,
    options?: ErrorOptions,
  ) {
    super(`Session ${sessionId} not found`, options);
  }
}
