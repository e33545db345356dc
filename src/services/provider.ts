/**
 * Provider Service
 * Builds the secret provider a manifest selects
 */

import { AwsSecretsManagerProvider } from './aws.js';
import type { ProviderConfig, SecretProvider } from '../types/index.js';

export function createProvider(config: ProviderConfig): SecretProvider {
  switch (config.kind) {
    case 'aws':
      return new AwsSecretsManagerProvider(config.aws);
  }
}
