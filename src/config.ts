// pattern: Functional Core
// Client configuration: defaults, overridable from the environment or by the caller.

import { ConfigError } from './errors';

export type ClientConfig = {
  readonly service: string;
  readonly chatService: string;
  readonly requestTimeoutMs: number;
  /** Applies to blob uploads and link-card fetches. */
  readonly uploadTimeoutMs: number;
  readonly maxImages: number;
  readonly maxPostLength: number;
};

export const DEFAULT_CONFIG: ClientConfig = {
  service: 'https://bsky.social',
  chatService: 'https://api.bsky.chat',
  requestTimeoutMs: 10_000,
  uploadTimeoutMs: 60_000,
  maxImages: 4,
  maxPostLength: 300,
};

type Env = Readonly<Record<string, string | undefined>>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`, key);
  }
  return value;
}

function readUrl(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  try {
    new URL(raw);
  } catch {
    throw new ConfigError(`${key} must be an absolute URL, got "${raw}"`, key);
  }
  return raw.replace(/\/+$/, '');
}

/**
 * Build the client configuration.
 * @param env - Environment variables (defaults to process.env)
 * @param overrides - Values that take precedence over the environment; undefined entries are ignored
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Partial<ClientConfig> = {}
): ClientConfig {
  const config: ClientConfig = {
    service: overrides.service ?? readUrl(env, 'SKYWRITE_SERVICE', DEFAULT_CONFIG.service),
    chatService:
      overrides.chatService ?? readUrl(env, 'SKYWRITE_CHAT_SERVICE', DEFAULT_CONFIG.chatService),
    requestTimeoutMs:
      overrides.requestTimeoutMs ??
      readPositiveInt(env, 'SKYWRITE_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs),
    uploadTimeoutMs:
      overrides.uploadTimeoutMs ??
      readPositiveInt(env, 'SKYWRITE_UPLOAD_TIMEOUT_MS', DEFAULT_CONFIG.uploadTimeoutMs),
    maxImages:
      overrides.maxImages ?? readPositiveInt(env, 'SKYWRITE_MAX_IMAGES', DEFAULT_CONFIG.maxImages),
    maxPostLength:
      overrides.maxPostLength ??
      readPositiveInt(env, 'SKYWRITE_MAX_POST_LENGTH', DEFAULT_CONFIG.maxPostLength),
  };
  return Object.freeze(config);
}
