/**
 * Secret Sync Constants
 */

// Manifest file names, checked in this order in every directory
export const MANIFEST_FILE_TOML = 'secret-sync.toml';
export const MANIFEST_FILE_JSON = 'secret-sync.json';
export const MANIFEST_FILE_NAMES = [MANIFEST_FILE_TOML, MANIFEST_FILE_JSON] as const;

// Region used when neither the manifest nor the SDK chain provides one
export const DEFAULT_AWS_REGION = 'us-east-1';

// Sync engine defaults
export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 250;

// Version
export const VERSION = '1.0.0';

// CLI styling
export const BRAND = {
  name: 'secret-sync',
  tagline: 'Keep local secret files and your secret manager in step.',
  prefix: '◆',
};
