/**
 * Config Service
 * Locates, parses and resolves the secret-sync manifest
 */

import fs from 'fs-extra';
import path from 'path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { MANIFEST_FILE_NAMES, DEFAULT_CONCURRENCY } from '../constants.js';
import { ConfigNotFoundError, ConfigParseError, errorMessage } from '../errors.js';
import { codecForPath } from './envfile.js';
import type { FileEntry, Manifest, ProviderConfig } from '../types/index.js';

const metadataSchema = z
  .object({
    description: z.string().optional(),
    tags: z.record(z.string()).optional(),
  })
  .strict();

const fileSchema = z
  .object({
    path: z.string().min(1),
    secret: z.string().min(1),
    metadata: metadataSchema.optional(),
    format: z.enum(['dotenv', 'json']).optional(),
  })
  .strict();

const manifestSchema = z
  .object({
    backend: z
      .object({ provider: z.enum(['aws']).default('aws') })
      .strict()
      .default({}),
    aws: z
      .object({
        profile: z.string().optional(),
        region: z.string().optional(),
        endpoint: z.string().url().optional(),
        credentials: z
          .object({
            access_key_id: z.string().min(1),
            access_key_secret: z.string().min(1),
          })
          .strict()
          .optional(),
      })
      .strict()
      .default({}),
    sync: z
      .object({ concurrency: z.number().int().positive().optional() })
      .strict()
      .default({}),
    files: z.record(fileSchema).default({}),
  })
  .strict();

export type ManifestFile = z.infer<typeof manifestSchema>;

/** Settings given on the command line that win over the manifest */
export interface ManifestOverrides {
  profile?: string;
  region?: string;
}

/**
 * Search the start directory, then each parent, for a manifest file
 */
export async function discoverManifest(startDir: string = process.cwd()): Promise<string> {
  let dir = path.resolve(startDir);

  for (;;) {
    for (const name of MANIFEST_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (!(await fs.pathExists(candidate))) {
        continue;
      }
      const stats = await fs.stat(candidate);
      if (stats.isDirectory()) {
        throw new ConfigNotFoundError(`expected ${candidate} to be a file but found a directory`);
      }
      return candidate;
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ConfigNotFoundError(
        `could not find ${MANIFEST_FILE_NAMES.join(' or ')} in ${path.resolve(startDir)} or any parent directory`
      );
    }
    dir = parent;
  }
}

/**
 * Parse manifest text according to the file extension (TOML when absent)
 */
export function parseManifest(configPath: string, text: string): ManifestFile {
  const ext = path.extname(configPath).toLowerCase();

  let raw: unknown;
  try {
    if (ext === '.json') {
      raw = JSON.parse(text);
    } else if (ext === '.toml' || ext === '') {
      raw = parseToml(text);
    } else {
      throw new ConfigParseError(configPath, `unsupported config file extension "${ext}"`);
    }
  } catch (err) {
    if (err instanceof ConfigParseError) {
      throw err;
    }
    throw new ConfigParseError(configPath, errorMessage(err), { cause: err });
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigParseError(configPath, `${field}: ${issue.message}`, { cause: result.error });
  }
  return result.data;
}

const ARRAY_INDEX_KEY = /^(0|[1-9]\d*)$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Order of the `files` keys as written in the manifest text.
 *
 * Parsed objects list integer-like keys first, so when any key is one of
 * those the order is recovered from where each key is declared. Keys whose
 * declaration is not found keep their parsed order after the others.
 */
export function declaredEntryOrder(configPath: string, text: string, keys: readonly string[]): string[] {
  if (!keys.some(key => ARRAY_INDEX_KEY.test(key))) {
    return [...keys];
  }

  const isJson = path.extname(configPath).toLowerCase() === '.json';
  const filesStart = isJson ? Math.max(0, text.indexOf('"files"')) : 0;

  const position = (key: string): number => {
    const name = escapeRegExp(key);
    const pattern = isJson
      ? new RegExp(`"${name}"\\s*:`, 'g')
      : new RegExp(`^[ \\t]*\\[?[ \\t]*files[ \\t]*\\.[ \\t]*(?:${name}|"${name}"|'${name}')[ \\t]*[\\].=]`, 'gm');
    pattern.lastIndex = filesStart;
    const match = pattern.exec(text);
    return match === null ? text.length : match.index;
  };

  const positions = new Map(keys.map(key => [key, position(key)]));
  return [...keys].sort((a, b) => (positions.get(a) ?? text.length) - (positions.get(b) ?? text.length));
}

async function readManifestText(configPath: string): Promise<string> {
  try {
    return await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigNotFoundError(`failed to read config file "${configPath}": ${errorMessage(err)}`);
  }
}

/**
 * Read and parse a manifest file
 */
export async function readManifestFile(configPath: string): Promise<ManifestFile> {
  return parseManifest(configPath, await readManifestText(configPath));
}

function resolveProvider(file: ManifestFile, overrides: ManifestOverrides): ProviderConfig {
  const { aws } = file;
  return {
    kind: file.backend.provider,
    aws: {
      profile: overrides.profile ?? aws.profile,
      region: overrides.region ?? aws.region,
      endpoint: aws.endpoint,
      credentials: aws.credentials && {
        accessKeyId: aws.credentials.access_key_id,
        secretAccessKey: aws.credentials.access_key_secret,
      },
    },
  };
}

/**
 * Build the immutable manifest: absolute entry paths and chosen codecs.
 * Entries follow `entryOrder`, the declaration order of the `files` keys.
 */
export function resolveManifest(
  file: ManifestFile,
  configPath: string | null,
  rootDir: string,
  overrides: ManifestOverrides = {},
  entryOrder: readonly string[] = Object.keys(file.files)
): Manifest {
  const rank = new Map(entryOrder.map((key, index) => [key, index]));
  const declaredEntries = Object.entries(file.files).sort(
    ([a], [b]) => (rank.get(a) ?? entryOrder.length) - (rank.get(b) ?? entryOrder.length)
  );

  const entries: FileEntry[] = declaredEntries.map(([key, declared]) => {
    const filePath = path.resolve(rootDir, declared.path);
    return Object.freeze({
      key,
      path: filePath,
      secretName: declared.secret,
      metadata: declared.metadata,
      codec: codecForPath(filePath, declared.format),
    });
  });

  return Object.freeze({
    configPath,
    rootDir,
    provider: resolveProvider(file, overrides),
    concurrency: file.sync.concurrency ?? DEFAULT_CONCURRENCY,
    entries: Object.freeze(entries),
  });
}

/**
 * Load the manifest at `configPath`; entries resolve against its directory
 */
export async function loadManifest(
  configPath: string,
  overrides: ManifestOverrides = {}
): Promise<Manifest> {
  const absolute = path.resolve(configPath);
  const text = await readManifestText(absolute);
  const file = parseManifest(absolute, text);
  const order = declaredEntryOrder(absolute, text, Object.keys(file.files));
  return resolveManifest(file, absolute, path.dirname(absolute), overrides, order);
}

/**
 * Manifest with no entries, for commands that run without a config file
 */
export function emptyManifest(rootDir: string, overrides: ManifestOverrides = {}): Manifest {
  return resolveManifest(manifestSchema.parse({}), null, rootDir, overrides);
}
