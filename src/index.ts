/**
 * secret-sync
 * Reconciles local secret files with a remote secret manager
 *
 * This module exports the core functionality for programmatic usage.
 */

// Types
export type {
  SecretValue,
  SecretMetadata,
  SecretCodec,
  CodecKind,
  SecretProvider,
  ProviderConfig,
  AwsProviderConfig,
  FileEntry,
  Manifest,
  SyncDirection,
  SyncStatus,
  SyncOutcome,
  SyncReport,
  SyncSummary,
  EntryFilter,
} from './types/index.js';

// Constants
export {
  MANIFEST_FILE_NAMES,
  VERSION,
} from './constants.js';

// Errors
export {
  SecretSyncError,
  ConfigNotFoundError,
  ConfigParseError,
  CodecError,
  FileReadError,
  FileWriteError,
  ProviderAuthError,
  ProviderTransportError,
  ProviderNotFoundError,
  ProviderConflictError,
} from './errors.js';
export type { SecretSyncErrorCode, CodecErrorKind } from './errors.js';

// Manifest
export {
  discoverManifest,
  parseManifest,
  readManifestFile,
  declaredEntryOrder,
  resolveManifest,
  loadManifest,
  emptyManifest,
} from './services/config.js';
export type { ManifestFile, ManifestOverrides } from './services/config.js';

export { filterEntries } from './services/filter.js';

// Codecs
export {
  dotenvCodec,
  jsonCodec,
  getCodec,
  codecForPath,
  parseEnvContent,
  serializeEnvContent,
  secretValuesEqual,
} from './services/envfile.js';

// Local files
export {
  readLocalFile,
  writeLocalFileAtomic,
} from './services/localfile.js';

// Providers
export { createProvider } from './services/provider.js';
export { AwsSecretsManagerProvider } from './services/aws.js';

// Sync engine
export {
  runSync,
  pullEntries,
  pushEntries,
  summarize,
} from './services/sync.js';
export type { SyncOptions } from './services/sync.js';
