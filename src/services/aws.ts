/**
 * AWS Secrets Manager Provider
 * Stores each secret file as a JSON object of string values, the key/value
 * convention of the Secrets Manager console
 */

import {
  SecretsManagerClient,
  DescribeSecretCommand,
  GetSecretValueCommand,
  CreateSecretCommand,
  PutSecretValueCommand,
  ResourceNotFoundException,
  ResourceExistsException,
  type GetSecretValueCommandOutput,
  type SecretsManagerClientConfig,
} from '@aws-sdk/client-secrets-manager';
import { DEFAULT_AWS_REGION } from '../constants.js';
import {
  CodecError,
  ProviderAuthError,
  ProviderConflictError,
  ProviderNotFoundError,
  ProviderTransportError,
  SecretSyncError,
  errorMessage,
} from '../errors.js';
import { parseEnvContent } from './envfile.js';
import type {
  AwsProviderConfig,
  SecretMetadata,
  SecretProvider,
  SecretValue,
} from '../types/index.js';

// Error names meaning the caller's credentials were rejected or unavailable
const AUTH_ERROR_NAMES = new Set([
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'ExpiredTokenException',
  'AccessDeniedException',
  'CredentialsProviderError',
  'InvalidClientTokenId',
]);

/**
 * Client settings for a provider config
 */
export function buildClientConfig(config: AwsProviderConfig): SecretsManagerClientConfig {
  const clientConfig: SecretsManagerClientConfig = {
    region: config.region ?? process.env.AWS_REGION ?? process.env.AWS_DEFAULT_REGION ?? DEFAULT_AWS_REGION,
  };

  if (config.profile) {
    clientConfig.profile = config.profile;
  }
  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
  }
  if (config.credentials) {
    clientConfig.credentials = {
      accessKeyId: config.credentials.accessKeyId,
      secretAccessKey: config.credentials.secretAccessKey,
    };
  }

  return clientConfig;
}

/**
 * Interpret a stored secret string. JSON objects are read as key/value
 * pairs (scalars stringified); any other text is read as .env content.
 */
export function decodeRemoteText(text: string): SecretValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return parseEnvContent(text);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return parseEnvContent(text);
  }

  const value: SecretValue = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      Object.defineProperty(value, key, {
        value: String(entry),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    } else {
      throw new CodecError('InvalidDocument', `remote value of "${key}" is not a scalar`);
    }
  }
  return value;
}

/**
 * Translate an SDK failure into the provider error taxonomy
 */
function toProviderError(err: unknown, secretName: string): SecretSyncError {
  if (err instanceof SecretSyncError) {
    return err;
  }
  if (err instanceof ResourceNotFoundException) {
    return new ProviderNotFoundError(secretName, { cause: err });
  }
  if (err instanceof ResourceExistsException) {
    return new ProviderConflictError(secretName, { cause: err });
  }
  if (err instanceof Error && AUTH_ERROR_NAMES.has(err.name)) {
    return new ProviderAuthError(`AWS rejected the credentials: ${err.message}`, { cause: err });
  }
  return new ProviderTransportError(
    `AWS request for "${secretName}" failed: ${errorMessage(err)}`,
    { cause: err }
  );
}

export class AwsSecretsManagerProvider implements SecretProvider {
  readonly name = 'aws';
  private readonly client: SecretsManagerClient;

  constructor(config: AwsProviderConfig, client?: SecretsManagerClient) {
    this.client = client ?? new SecretsManagerClient(buildClientConfig(config));
  }

  async exists(secretName: string): Promise<boolean> {
    try {
      await this.client.send(new DescribeSecretCommand({ SecretId: secretName }));
      return true;
    } catch (err) {
      const mapped = toProviderError(err, secretName);
      if (mapped instanceof ProviderNotFoundError) {
        return false;
      }
      throw mapped;
    }
  }

  async fetch(secretName: string): Promise<SecretValue> {
    let output: GetSecretValueCommandOutput;
    try {
      output = await this.client.send(new GetSecretValueCommand({ SecretId: secretName }));
    } catch (err) {
      throw toProviderError(err, secretName);
    }

    let text: string;
    if (output.SecretString !== undefined) {
      text = output.SecretString;
    } else if (output.SecretBinary !== undefined) {
      text = Buffer.from(output.SecretBinary).toString('utf-8');
    } else {
      throw new ProviderTransportError(`secret "${secretName}" has no value`);
    }

    try {
      return decodeRemoteText(text);
    } catch (err) {
      if (err instanceof CodecError) {
        throw new CodecError(
          err.kind,
          `remote value of "${secretName}" is not key/value content: ${err.message}`
        );
      }
      throw err;
    }
  }

  async create(secretName: string, value: SecretValue, metadata?: SecretMetadata): Promise<void> {
    const tags = metadata?.tags
      ? Object.entries(metadata.tags).map(([Key, Value]) => ({ Key, Value }))
      : undefined;

    try {
      await this.client.send(
        new CreateSecretCommand({
          Name: secretName,
          SecretString: JSON.stringify(value),
          Description: metadata?.description,
          Tags: tags,
        })
      );
    } catch (err) {
      throw toProviderError(err, secretName);
    }
  }

  async update(secretName: string, value: SecretValue): Promise<void> {
    try {
      await this.client.send(
        new PutSecretValueCommand({
          SecretId: secretName,
          SecretString: JSON.stringify(value),
        })
      );
    } catch (err) {
      throw toProviderError(err, secretName);
    }
  }
}
