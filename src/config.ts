/**
 * Runtime configuration from environment variables and the client secrets
 * file downloaded from the Google Cloud console.
 *
 * Environment variables:
 *   NOTE2GDOCS_CLIENT_ID         - OAuth client ID (overrides the secrets file)
 *   NOTE2GDOCS_CLIENT_SECRET     - OAuth client secret (overrides the secrets file)
 *   NOTE2GDOCS_CREDENTIALS_FILE  - client secrets JSON (default: credentials.json)
 *   NOTE2GDOCS_TOKEN_FILE        - token cache (default: ~/.note2gdocs/token.json)
 *   NOTE2GDOCS_LOG_LEVEL         - debug | info | warn | error | silent (default: info)
 *   NOTE2GDOCS_RATE_LIMIT        - API requests per second (default: 5)
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

export interface NoteConfig {
  clientId?: string;
  clientSecret?: string;
  credentialsFile: string;
  tokenFile: string;
  logLevel: LogLevel;
  requestsPerSecond: number;
}

/** Client credentials, present. */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/** Error thrown for invalid or incomplete configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CREDENTIALS_FILE = 'credentials.json';
export const DEFAULT_REQUESTS_PER_SECOND = 5;

export function defaultTokenFile(): string {
  return join(homedir(), '.note2gdocs', 'token.json');
}

/**
 * Read client credentials from a Google client secrets file.
 *
 * Accepts the `installed` (desktop app) and `web` layouts. Returns
 * `undefined` when the file does not exist.
 */
export function readClientSecrets(path: string): Partial<ClientCredentials> | undefined {
  if (!existsSync(path)) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot parse client secrets file ${path}: ${String(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Client secrets file ${path} is not a JSON object`);
  }
  const section = parsed.installed ?? parsed.web;
  if (!isRecord(section)) {
    throw new ConfigError(`Client secrets file ${path} has no "installed" or "web" section`);
  }

  return {
    clientId: typeof section.client_id === 'string' ? section.client_id : undefined,
    clientSecret: typeof section.client_secret === 'string' ? section.client_secret : undefined,
  };
}

/**
 * Build the configuration from `env`.
 *
 * Credentials may be absent: only commands that call the API need them (see
 * {@link requireCredentials}).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NoteConfig {
  const credentialsFile = env.NOTE2GDOCS_CREDENTIALS_FILE || DEFAULT_CREDENTIALS_FILE;
  const secrets = readClientSecrets(credentialsFile);

  const logLevel = env.NOTE2GDOCS_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid NOTE2GDOCS_LOG_LEVEL: ${logLevel}`);
  }

  let requestsPerSecond = DEFAULT_REQUESTS_PER_SECOND;
  if (env.NOTE2GDOCS_RATE_LIMIT) {
    requestsPerSecond = parseInt(env.NOTE2GDOCS_RATE_LIMIT, 10);
    if (isNaN(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new ConfigError(`Invalid NOTE2GDOCS_RATE_LIMIT: ${env.NOTE2GDOCS_RATE_LIMIT}`);
    }
  }

  return {
    clientId: env.NOTE2GDOCS_CLIENT_ID || secrets?.clientId,
    clientSecret: env.NOTE2GDOCS_CLIENT_SECRET || secrets?.clientSecret,
    credentialsFile,
    tokenFile: env.NOTE2GDOCS_TOKEN_FILE || defaultTokenFile(),
    logLevel,
    requestsPerSecond,
  };
}

/**
 * Return the client credentials or fail with a message naming what is missing.
 */
export function requireCredentials(config: NoteConfig): ClientCredentials {
  const { clientId, clientSecret } = config;
  if (!clientId || !clientSecret) {
    throw new ConfigError(
      `OAuth client credentials not found: set NOTE2GDOCS_CLIENT_ID and NOTE2GDOCS_CLIENT_SECRET, ` +
        `or provide ${config.credentialsFile}`,
    );
  }
  return { clientId, clientSecret };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
