import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse } from 'dotenv';
import {
  CONFIG_ERRORS,
  DEFAULT_ENV_FILE,
  ENV_KEYS,
  PLACEHOLDER_HOSTS,
  PLACEHOLDER_PREFIXES,
  UNSUPPORTED_KEY_PREFIXES,
} from '@/config/constants';
import { ConfigError } from '@/library/errors';

export interface Configuration {
  readonly serviceUrl: string;
  readonly publicApiKey: string;
}

export interface LoadOptions {
  /** Defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Path of the dotenv file; `false` skips it. Defaults to `.env` in the working directory. */
  envFile?: string | false;
}

const JWT_PATTERN = /^eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

function readEnvFile(path: string | false): Record<string, string> {
  if (path === false || !existsSync(path)) {
    return {};
  }

  return parse(readFileSync(path));
}

export function isPlaceholder(value: string): boolean {
  const lowered = value.toLowerCase();

  if (PLACEHOLDER_PREFIXES.some(prefix => lowered.startsWith(prefix))) {
    return true;
  }

  try {
    const { hostname } = new URL(lowered);
    return PLACEHOLDER_HOSTS.some(host => hostname.startsWith(host));
  } catch {
    return false;
  }
}

function pick(
  key: string,
  env: Readonly<Record<string, string | undefined>>,
  file: Record<string, string>
): string {
  // A non-blank environment variable always wins over the dotenv file.
  const fromEnv = env[key]?.trim() ?? '';
  if (fromEnv) return fromEnv;
  return file[key]?.trim() ?? '';
}

function assertServiceUrl(value: string) {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError('INVALID_SECRET', CONFIG_ERRORS.INVALID_URL, [ENV_KEYS.SUPABASE_URL]);
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError('INVALID_SECRET', CONFIG_ERRORS.INVALID_URL, [ENV_KEYS.SUPABASE_URL]);
  }
}

function assertAnonKey(value: string) {
  if (UNSUPPORTED_KEY_PREFIXES.some(prefix => value.startsWith(prefix))) {
    throw new ConfigError('INVALID_SECRET', CONFIG_ERRORS.UNSUPPORTED_KEY, [ENV_KEYS.SUPABASE_ANON_KEY]);
  }

  if (!JWT_PATTERN.test(value)) {
    throw new ConfigError('INVALID_SECRET', CONFIG_ERRORS.INVALID_KEY, [ENV_KEYS.SUPABASE_ANON_KEY]);
  }
}

/**
 * Resolves the Supabase endpoint and anon key. Throws ConfigError before anything
 * touches the network when either is missing or still the documented example.
 */
export function load(options: LoadOptions = {}): Configuration {
  const env = options.env ?? process.env;
  const file = readEnvFile(
    options.envFile === undefined ? resolve(process.cwd(), DEFAULT_ENV_FILE) : options.envFile
  );

  const serviceUrl = pick(ENV_KEYS.SUPABASE_URL, env, file);
  const publicApiKey = pick(ENV_KEYS.SUPABASE_ANON_KEY, env, file);

  const missing: string[] = [];
  if (!serviceUrl || isPlaceholder(serviceUrl)) missing.push(ENV_KEYS.SUPABASE_URL);
  if (!publicApiKey || isPlaceholder(publicApiKey)) missing.push(ENV_KEYS.SUPABASE_ANON_KEY);

  if (missing.length > 0) {
    throw new ConfigError('MISSING_SECRET', CONFIG_ERRORS.MISSING_SECRET(missing), missing);
  }

  assertServiceUrl(serviceUrl);
  assertAnonKey(publicApiKey);

  return Object.freeze({ serviceUrl, publicApiKey });
}

/**
 * LOG_LEVEL follows the same precedence as the secrets but is never required.
 */
export function loadLogLevelSetting(options: LoadOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  const file = readEnvFile(
    options.envFile === undefined ? resolve(process.cwd(), DEFAULT_ENV_FILE) : options.envFile
  );
  return pick(ENV_KEYS.LOG_LEVEL, env, file) || undefined;
}
