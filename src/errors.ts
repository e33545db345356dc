/**
 * Error Types
 * Every failure the engine distinguishes carries a stable `code`
 */

import type { SyncOutcome } from './types/index.js';

export type SecretSyncErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE'
  | 'CODEC'
  | 'FILE_READ'
  | 'FILE_WRITE'
  | 'PROVIDER_AUTH'
  | 'PROVIDER_TRANSPORT'
  | 'PROVIDER_NOT_FOUND'
  | 'PROVIDER_CONFLICT';

export class SecretSyncError extends Error {
  readonly code: SecretSyncErrorCode;

  constructor(code: SecretSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigNotFoundError extends SecretSyncError {
  constructor(message: string) {
    super('CONFIG_NOT_FOUND', message);
  }
}

export class ConfigParseError extends SecretSyncError {
  readonly configPath: string;

  constructor(configPath: string, detail: string, options?: { cause?: unknown }) {
    super('CONFIG_PARSE', `failed to parse config file "${configPath}": ${detail}`, options);
    this.configPath = configPath;
  }
}

export type CodecErrorKind = 'DuplicateKey' | 'MalformedLine' | 'InvalidDocument';

export class CodecError extends SecretSyncError {
  readonly kind: CodecErrorKind;
  /** 1-based line number, when the format is line based */
  readonly line?: number;

  constructor(kind: CodecErrorKind, message: string, line?: number) {
    super('CODEC', line === undefined ? message : `line ${line}: ${message}`);
    this.kind = kind;
    this.line = line;
  }
}

export class FileReadError extends SecretSyncError {
  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('FILE_READ', `failed to read "${path}": ${detail}`, options);
  }
}

export class FileWriteError extends SecretSyncError {
  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('FILE_WRITE', `failed to write "${path}": ${detail}`, options);
  }
}

export class ProviderAuthError extends SecretSyncError {
  /** Outcomes of entries that finished before the run was stopped */
  readonly outcomes: readonly SyncOutcome[];

  constructor(message: string, options?: { cause?: unknown; outcomes?: readonly SyncOutcome[] }) {
    super('PROVIDER_AUTH', message, options);
    this.outcomes = options?.outcomes ?? [];
  }
}

export class ProviderTransportError extends SecretSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROVIDER_TRANSPORT', message, options);
  }
}

export class ProviderNotFoundError extends SecretSyncError {
  readonly secretName: string;

  constructor(secretName: string, options?: { cause?: unknown }) {
    super('PROVIDER_NOT_FOUND', `secret "${secretName}" not found`, options);
    this.secretName = secretName;
  }
}

export class ProviderConflictError extends SecretSyncError {
  readonly secretName: string;

  constructor(secretName: string, options?: { cause?: unknown }) {
    super('PROVIDER_CONFLICT', `secret "${secretName}" already exists`, options);
    this.secretName = secretName;
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
