/**
 * Env File Service
 * Codecs between secret file text and key-value secret values
 */

import path from 'path';
import { CodecError } from '../errors.js';
import type { CodecKind, SecretCodec, SecretValue } from '../types/index.js';

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Values containing any of these are written double quoted
const NEEDS_QUOTES = /[\s="'#]/;

const UNESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
};

/**
 * Check whether a key can be written as KEY=VALUE
 */
export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/**
 * Read a quoted value starting at the opening quote of `raw`
 */
function parseQuoted(raw: string, line: number): string {
  const quote = raw[0];
  let value = '';

  for (let i = 1; i < raw.length; i++) {
    const ch = raw[i];

    if (ch === '\\' && i + 1 < raw.length) {
      const next = raw[i + 1];
      if (next === quote) {
        value += quote;
      } else if (next in UNESCAPES) {
        value += UNESCAPES[next];
      } else {
        value += ch + next;
      }
      i++;
      continue;
    }

    if (ch === quote) {
      const rest = raw.slice(i + 1).trim();
      if (rest !== '' && !rest.startsWith('#')) {
        throw new CodecError('MalformedLine', 'unexpected characters after closing quote', line);
      }
      return value;
    }

    value += ch;
  }

  throw new CodecError('MalformedLine', 'unterminated quoted value', line);
}

/**
 * Parse .env content to key-value pairs
 */
export function parseEnvContent(content: string): SecretValue {
  const variables = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  lines.forEach((text, index) => {
    const line = index + 1;
    const trimmed = text.trim();

    // Blank lines and comments
    if (trimmed === '' || trimmed.startsWith('#')) {
      return;
    }

    const body = trimmed.replace(/^export\s+/, '');
    const separator = body.indexOf('=');
    if (separator < 0) {
      throw new CodecError('MalformedLine', 'expected KEY=VALUE', line);
    }

    const key = body.slice(0, separator).trim();
    if (!isValidKey(key)) {
      throw new CodecError('MalformedLine', `invalid key "${key}"`, line);
    }
    if (variables.has(key)) {
      throw new CodecError('DuplicateKey', `duplicate key "${key}"`, line);
    }

    const raw = body.slice(separator + 1).trim();
    const quoted = raw.startsWith('"') || raw.startsWith("'");
    variables.set(key, quoted ? parseQuoted(raw, line) : raw);
  });

  return Object.fromEntries(variables);
}

/**
 * Serialize key-value pairs to .env format
 */
export function serializeEnvContent(variables: SecretValue): string {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(variables)) {
    if (!isValidKey(key)) {
      throw new CodecError('InvalidDocument', `key "${key}" cannot be written as KEY=VALUE`);
    }

    if (NEEDS_QUOTES.test(value)) {
      const escaped = value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r')
        .replace(/\t/g, '\\t');
      lines.push(`${key}="${escaped}"`);
    } else {
      lines.push(`${key}=${value}`);
    }
  }

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * Parse a JSON document holding a flat object of string values
 */
export function parseJsonContent(content: string): SecretValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new CodecError('InvalidDocument', `invalid JSON: ${detail}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CodecError('InvalidDocument', 'expected a JSON object');
  }

  const variables: SecretValue = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new CodecError('InvalidDocument', `value of "${key}" must be a string`);
    }
    Object.defineProperty(variables, key, { value, enumerable: true, writable: true, configurable: true });
  }
  return variables;
}

export function serializeJsonContent(variables: SecretValue): string {
  return JSON.stringify(variables, null, 2) + '\n';
}

export const dotenvCodec: SecretCodec = {
  kind: 'dotenv',
  decode: parseEnvContent,
  encode: serializeEnvContent,
};

export const jsonCodec: SecretCodec = {
  kind: 'json',
  decode: parseJsonContent,
  encode: serializeJsonContent,
};

const CODECS: Record<CodecKind, SecretCodec> = {
  dotenv: dotenvCodec,
  json: jsonCodec,
};

export function getCodec(kind: CodecKind): SecretCodec {
  return CODECS[kind];
}

/**
 * Pick the codec for a file: an explicit format wins, then the extension
 */
export function codecForPath(filePath: string, format?: CodecKind): SecretCodec {
  if (format) {
    return getCodec(format);
  }
  return path.extname(filePath).toLowerCase() === '.json' ? jsonCodec : dotenvCodec;
}

/**
 * Compare two secret values as mappings, ignoring key order
 */
export function secretValuesEqual(a: SecretValue, b: SecretValue): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every(key => Object.hasOwn(b, key) && a[key] === b[key]);
}
