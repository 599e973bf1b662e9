/**
 * Secrets Module
 *
 * SecretStore capability: returns a decoded key-value mapping for a secret
 * name, or throws ConfigurationError when the secret is missing or is not a
 * JSON object.
 */

import {
  SecretsManagerClient,
  GetSecretValueCommand,
  type GetSecretValueCommandOutput,
} from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from '../config/index.js';
import { defaultLogger } from '../logging/index.js';
import type { Logger } from '../types/index.js';

export interface SecretStore {
  getSecret(name: string): Promise<Record<string, unknown>>;
}

/**
 * Narrow view of the Secrets Manager client, injectable in tests
 */
export interface SecretsTransport {
  send(command: GetSecretValueCommand): Promise<GetSecretValueCommandOutput>;
}

export interface AwsSecretStoreConfig {
  region: string;
}

/**
 * Decode a raw secret string into a key-value mapping
 */
export function decodeSecret(name: string, raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Failed to decode secret '${name}' as JSON`, { error });
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`Secret '${name}' is not a JSON object`);
  }

  return Object.fromEntries(Object.entries(parsed));
}

/**
 * AWS Secrets Manager implementation of SecretStore
 */
export class AwsSecretStore implements SecretStore {
  private transport: SecretsTransport;
  private logger: Logger;

  constructor(config: AwsSecretStoreConfig, logger: Logger = defaultLogger, transport?: SecretsTransport) {
    this.logger = logger;
    if (transport) {
      this.transport = transport;
    } else {
      const client = new SecretsManagerClient({
        region: config.region,
        maxAttempts: 2,
      });
      this.transport = { send: (command) => client.send(command) };
    }
  }

  async getSecret(name: string): Promise<Record<string, unknown>> {
    let response: GetSecretValueCommandOutput;
    try {
      response = await this.transport.send(new GetSecretValueCommand({ SecretId: name }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Secrets Manager request failed', { secretName: name, error: message });
      if (error instanceof Error && error.name === 'ResourceNotFoundException') {
        throw new ConfigurationError(`Secret '${name}' not found.`, { error });
      }
      throw error;
    }

    if (response.SecretString !== undefined) {
      return decodeSecret(name, response.SecretString);
    }

    // Binary secrets hold base64 text of the JSON document
    if (response.SecretBinary !== undefined) {
      const encoded = Buffer.from(response.SecretBinary).toString('ascii');
      return decodeSecret(name, Buffer.from(encoded, 'base64').toString('utf-8'));
    }

    throw new ConfigurationError(`Secret '${name}' has neither SecretString nor SecretBinary`);
  }
}

/**
 * In-memory SecretStore for tests and local runs
 */
export class MemorySecretStore implements SecretStore {
  private secrets: Map<string, Record<string, unknown>>;

  constructor(secrets: Record<string, Record<string, unknown>> = {}) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async getSecret(name: string): Promise<Record<string, unknown>> {
    const secret = this.secrets.get(name);
    if (!secret) {
      throw new ConfigurationError(`Secret '${name}' not found.`);
    }
    return { ...secret };
  }
}
