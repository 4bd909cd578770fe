import * as fs from 'fs';
import { ConnectionConfig } from '../interfaces';
import { ConfigNotFoundError } from './errors';
import {
  ValidationError,
  sanitizeNumber,
  sanitizeSSHHost,
  sanitizeSSHUsername,
  sanitizeSessionName,
  sanitizeVenvName,
} from './sanitization';

export type RawConfig = Record<string, string>;

export const DEFAULT_CONFIG_FILE = 'connection_config.txt';
export const DEFAULT_PORT = 22;
export const DEFAULT_TMUX_SESSION = 'remote';
export const DEFAULT_VENV_NAME = 'ml_env';
export const DEFAULT_TIMEOUT_SECONDS = 10;

/**
 * @description Values that beat both the environment and the file, e.g. CLI flags.
 */
export interface ConfigOverrides {
  host?: string;
  port?: string;
  username?: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  timeout?: string;
  tmuxSession?: string;
  venvName?: string;
}

type Env = Record<string, string | undefined>;

/**
 * @description Parse `key=value` lines. Blank lines, `#` comments and lines without `=` are skipped.
 */
export function parseConfigText(text: string): RawConfig {
  const config: RawConfig = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const separator = line.indexOf('=');
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (key.length === 0) continue;

    config[key] = value;
  }

  return config;
}

export function serializeConfig(config: RawConfig): string {
  return Object.entries(config)
    .map(([key, value]) => `${key}=${value}\n`)
    .join('');
}

/**
 * @description Read a config file. Throws ConfigNotFoundError when the file is absent;
 * the caller decides whether that is fatal.
 */
export function loadConfigFile(configFile: string = DEFAULT_CONFIG_FILE): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(configFile, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigNotFoundError(configFile, { cause: error });
    }
    throw error;
  }

  return parseConfigText(text);
}

const pick = (...values: (string | undefined)[]): string | undefined =>
  values.find((value) => value !== undefined && value.trim() !== '');

/**
 * @description Merge flags, environment and file entries into a validated connection config.
 */
export function resolveConnectionConfig(
  raw: RawConfig,
  env: Env = process.env,
  overrides: ConfigOverrides = {}
): Readonly<ConnectionConfig> {
  const host = pick(overrides.host, env.SSH_HOST, raw.hostname);
  const username = pick(overrides.username, env.SSH_USERNAME, raw.username);

  if (!host || !username) {
    throw new ValidationError(
      'Host and username are required. Provide them in the config file (hostname, username), via options, or environment variables (SSH_HOST, SSH_USERNAME)'
    );
  }

  const port = pick(overrides.port, env.SSH_PORT, raw.port);
  const timeout = pick(overrides.timeout, env.SSH_TIMEOUT, raw.timeout);
  const password = pick(overrides.password, env.SSH_PASSWORD, raw.password);
  const privateKeyPath = pick(
    overrides.privateKeyPath,
    env.SSH_PRIVATE_KEY,
    raw.key_filename
  );
  const passphrase = pick(
    overrides.passphrase,
    env.SSH_PASSPHRASE,
    raw.passphrase
  );

  if (!password && !privateKeyPath) {
    throw new ValidationError(
      'Either a password or a private key must be provided (password / key_filename, or SSH_PASSWORD / SSH_PRIVATE_KEY)'
    );
  }

  const config: ConnectionConfig = {
    host: sanitizeSSHHost(host),
    port: port ? sanitizeNumber(port, 'port', 1, 65535) : DEFAULT_PORT,
    username: sanitizeSSHUsername(username),
    tmuxSession: sanitizeSessionName(
      pick(overrides.tmuxSession, raw.tmux_session) ?? DEFAULT_TMUX_SESSION
    ),
    venvName: sanitizeVenvName(
      pick(overrides.venvName, raw.venv_name) ?? DEFAULT_VENV_NAME
    ),
    readyTimeout:
      (timeout
        ? sanitizeNumber(timeout, 'timeout', 1, 3600)
        : DEFAULT_TIMEOUT_SECONDS) * 1000,
  };

  if (password) config.password = password;
  if (privateKeyPath) config.privateKeyPath = privateKeyPath;
  if (passphrase) config.passphrase = passphrase;

  return Object.freeze(config);
}
