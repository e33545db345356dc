/**
 * Shared test fixtures: temp directories, entries and manifests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { codecForPath } from '../../src/services/envfile.js';
import type { CodecKind, FileEntry, SecretMetadata } from '../../src/types/index.js';

export function tmpDir(prefix = 'secret-sync-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDirs(dirs: string[]): void {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export interface EntryOptions {
  file?: string;
  secretName?: string;
  metadata?: SecretMetadata;
  format?: CodecKind;
}

/**
 * Entry named `key` for `<dir>/<key>.env` and secret `app/<key>`
 */
export function makeEntry(dir: string, key: string, options: EntryOptions = {}): FileEntry {
  const filePath = path.join(dir, options.file ?? `${key}.env`);
  return {
    key,
    path: filePath,
    secretName: options.secretName ?? `app/${key}`,
    metadata: options.metadata,
    codec: codecForPath(filePath, options.format),
  };
}

export const SAMPLE_TOML = `
[backend]
provider = "aws"

[aws]
profile = "dev"
region = "eu-west-1"

[files.api]
path = "api/.env"
secret = "app/api"

[files.api.metadata]
description = "API secrets"
tags = { team = "core" }

[files.worker]
path = "/srv/worker/secrets.json"
secret = "app/worker"
`;

export const SAMPLE_JSON = JSON.stringify({
  backend: { provider: 'aws' },
  aws: { profile: 'dev', region: 'eu-west-1' },
  files: {
    api: {
      path: 'api/.env',
      secret: 'app/api',
      metadata: { description: 'API secrets', tags: { team: 'core' } },
    },
    worker: { path: '/srv/worker/secrets.json', secret: 'app/worker' },
  },
});
