import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { load as parseYaml } from 'js-yaml';
import { config as loadDotenv } from 'dotenv';
import type { ClientConfig, ClientConfigOverrides } from './client-config.interface.js';
import { ClientConfigValidator } from './validators/client-config-validator.js';
import {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_SECS,
  DEFAULT_USER_AGENT,
} from '../common/constants/app.constants.js';

type Env = Record<string, string | undefined>;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on', 'enable', 'enabled']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off', 'disable', 'disabled']);

/**
 * Built-in defaults. A fresh object on every call.
 */
export function createDefaultClientConfig(): ClientConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    userAgent: DEFAULT_USER_AGENT,
    debug: false,
    timeoutSecs: DEFAULT_TIMEOUT_SECS,
    defaultHeaders: {},
    rateLimiting: {
      enabled: true,
      general: { requestsPerSecond: 100, burstCapacity: 200, enabled: true },
      statistics: { requestsPerSecond: 1, burstCapacity: 1, enabled: true },
      sendMessage: { requestsPerSecond: 100, burstCapacity: 200, enabled: true },
    },
    retry: {
      enabled: true,
      maxRetries: 3,
      retryClientErrors: false,
      backoffStrategy: 'exponential',
      baseDelayMs: 1000,
      maxDelayMs: 30_000,
    },
    idempotency: {
      autoGenerate: true,
      keyPrefix: '',
    },
  };
}

/**
 * Resolve client configuration.
 *
 * Layers, lowest precedence first: built-in defaults, the YAML file named by
 * `AHASEND_CONFIG_PATH`, `AHASEND_*` environment variables, then `overrides`.
 * `.env.<NODE_ENV>` and `.env` are loaded only when reading from `process.env`.
 *
 * @throws ConfigValidationError when the merged result is invalid
 */
export function loadClientConfig(
  overrides: ClientConfigOverrides = {},
  env: Env = process.env,
): ClientConfig {
  if (env === process.env) {
    loadEnvironmentVariables();
  }

  const config: Record<string, unknown> = { ...createDefaultClientConfig() };

  const configPath = env['AHASEND_CONFIG_PATH']?.trim();
  if (configPath) {
    mergeInto(config, readYamlConfig(resolve(configPath), env));
  }

  mergeInto(config, readEnvConfig(env));
  mergeInto(config, { ...overrides });

  const validator: ClientConfigValidator = new ClientConfigValidator();
  validator.validate(config);

  return config;
}

/**
 * Load environment variables from .env files
 */
function loadEnvironmentVariables(): void {
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';
  const envFiles = [`.env.${nodeEnv}`, '.env'];

  for (const envFile of envFiles) {
    const envPath = resolve(envFile);
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath });
    }
  }
}

function readYamlConfig(absolutePath: string, env: Env): Record<string, unknown> {
  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Failed to read client config file at ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(substituteEnvVariables(content, env));
  } catch (error) {
    throw new Error(
      `Failed to parse YAML config file at ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  // An empty file parses to undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Client configuration at ${absolutePath} must be a YAML mapping`);
  }
  return parsed;
}

/**
 * Substitute environment variables in the format ${VAR_NAME}
 * Skips YAML comments (lines starting with #)
 */
function substituteEnvVariables(content: string, env: Env): string {
  return content
    .split('\n')
    .map(line => {
      if (line.trim().startsWith('#')) {
        return line;
      }

      return line.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
        const value = env[varName];
        if (value === undefined) {
          throw new Error(`Environment variable ${varName} is not defined`);
        }
        return value;
      });
    })
    .join('\n');
}

/**
 * Map AHASEND_* variables onto config fields. Unset, blank or unparsable values are ignored.
 */
function readEnvConfig(env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const rateLimiting: Record<string, unknown> = {};
  const retry: Record<string, unknown> = {};
  const idempotency: Record<string, unknown> = {};

  const apiKey = readString(env, 'AHASEND_API_KEY') ?? readString(env, 'AHASEND_TOKEN');
  if (apiKey !== undefined) result['apiKey'] = apiKey;

  const baseUrl = readBaseUrl(env);
  if (baseUrl !== undefined) result['baseUrl'] = baseUrl;

  const debug = readBoolean(env, 'AHASEND_DEBUG');
  if (debug !== undefined) result['debug'] = debug;

  const userAgent = readString(env, 'AHASEND_USER_AGENT');
  if (userAgent !== undefined) result['userAgent'] = userAgent;

  const timeout = readInteger(env, 'AHASEND_TIMEOUT');
  if (timeout !== undefined && timeout > 0) result['timeoutSecs'] = timeout;

  const rateLimitEnabled = readBoolean(env, 'AHASEND_ENABLE_RATE_LIMIT');
  if (rateLimitEnabled !== undefined) rateLimiting['enabled'] = rateLimitEnabled;

  const maxRetries = readInteger(env, 'AHASEND_MAX_RETRIES');
  if (maxRetries !== undefined && maxRetries >= 0) retry['maxRetries'] = maxRetries;

  const autoGenerate = readBoolean(env, 'AHASEND_IDEMPOTENCY_AUTO_GENERATE');
  if (autoGenerate !== undefined) idempotency['autoGenerate'] = autoGenerate;

  const keyPrefix = readString(env, 'AHASEND_IDEMPOTENCY_PREFIX');
  if (keyPrefix !== undefined) idempotency['keyPrefix'] = keyPrefix;

  result['rateLimiting'] = rateLimiting;
  result['retry'] = retry;
  result['idempotency'] = idempotency;
  return result;
}

/**
 * AHASEND_BASE_URL, with AHASEND_HOST and AHASEND_SCHEME overriding its parts.
 * A base URL without a scheme is taken as https.
 */
function readBaseUrl(env: Env): string | undefined {
  const baseUrl = readString(env, 'AHASEND_BASE_URL');
  const host = readString(env, 'AHASEND_HOST');
  const scheme = readString(env, 'AHASEND_SCHEME');

  if (baseUrl === undefined && host === undefined && scheme === undefined) {
    return undefined;
  }

  let currentScheme = 'https';
  let currentHost = new URL(DEFAULT_BASE_URL).host;

  if (baseUrl !== undefined) {
    const match = /^(https?):\/\/(.*)$/.exec(baseUrl);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      currentScheme = match[1];
      currentHost = match[2];
    } else {
      currentHost = baseUrl;
    }
  }

  return `${scheme ?? currentScheme}://${host ?? currentHost}`.replace(/\/+$/, '');
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const value = readString(env, key)?.toLowerCase();
  if (value === undefined) return undefined;
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return undefined;
}

function readInteger(env: Env, key: string): number | undefined {
  const value = readString(env, key);
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `source` into `target`. Nested mappings merge key by key;
 * anything else, arrays included, replaces. Undefined values are skipped.
 */
function mergeInto(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }

    const current = target[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      const merged: Record<string, unknown> = { ...current };
      mergeInto(merged, value);
      target[key] = merged;
    } else {
      target[key] = value;
    }
  }
}
