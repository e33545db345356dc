/**
 * Secret Sync Type Definitions
 */

/**
 * Ordered key-value contents of one secret file or one remote secret.
 * Keys are unique; iteration order is the file order.
 */
export type SecretValue = Record<string, string>;

/** Metadata applied to a remote secret when it is first created */
export interface SecretMetadata {
  description?: string;
  tags?: Record<string, string>;
}

/** Tag of a secret file format */
export type CodecKind = 'dotenv' | 'json';

export interface SecretCodec {
  readonly kind: CodecKind;
  /** Parse file text, throwing CodecError on invalid content */
  decode(text: string): SecretValue;
  encode(value: SecretValue): string;
}

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export interface AwsProviderConfig {
  /** Shared config profile to load credentials from */
  profile?: string;
  region?: string;
  /** Secrets Manager endpoint override (e.g. a local emulator) */
  endpoint?: string;
  credentials?: AwsCredentials;
}

export type ProviderConfig = {
  kind: 'aws';
  aws: AwsProviderConfig;
};

/** One declared local-file-to-remote-secret mapping */
export interface FileEntry {
  /** Identifier of the entry in the manifest */
  key: string;
  /** Absolute path of the local file */
  path: string;
  secretName: string;
  metadata?: SecretMetadata;
  codec: SecretCodec;
}

export interface Manifest {
  /** Absolute path of the manifest file, or null when none was used */
  configPath: string | null;
  /** Directory relative entry paths resolve against */
  rootDir: string;
  provider: ProviderConfig;
  concurrency: number;
  entries: readonly FileEntry[];
}

export type SyncDirection = 'pull' | 'push';

export type SyncStatus = 'created' | 'updated' | 'unchanged' | 'skipped' | 'failed';

interface OutcomeBase {
  entryKey: string;
  secretName: string;
  path: string;
}

export type SyncOutcome =
  | (OutcomeBase & { status: 'created' | 'updated' | 'unchanged' })
  | (OutcomeBase & { status: 'skipped' | 'failed'; reason: string });

export interface SyncReport {
  direction: SyncDirection;
  dryRun: boolean;
  /** One outcome per entry, in manifest order */
  outcomes: SyncOutcome[];
  /** True when any outcome failed */
  failed: boolean;
}

export type SyncSummary = Record<SyncStatus, number>;

export interface EntryFilter {
  keys?: string[];
  globs?: string[];
}

/**
 * Remote secret store capabilities. Metadata is only ever sent by `create`.
 */
export interface SecretProvider {
  readonly name: string;
  exists(secretName: string): Promise<boolean>;
  /** Throws ProviderNotFoundError when the secret does not exist */
  fetch(secretName: string): Promise<SecretValue>;
  /** Throws ProviderConflictError when the secret already exists */
  create(secretName: string, value: SecretValue, metadata?: SecretMetadata): Promise<void>;
  /** Throws ProviderNotFoundError when the secret does not exist */
  update(secretName: string, value: SecretValue): Promise<void>;
}
