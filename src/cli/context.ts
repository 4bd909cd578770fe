import { Command } from 'commander';
import chalk from 'chalk';
import { ConnectionConfig, ExecutionResult } from '../interfaces';
import {
  ConfigOverrides,
  RawConfig,
  loadConfigFile,
  resolveConnectionConfig,
} from '../lib/config';
import { ConfigNotFoundError, describeError } from '../lib/errors';
import { ValidationError, sanitizeSSHKeyPath } from '../lib/sanitization';
import { Logger, consoleLogger } from '../lib/logger';

export type GlobalOptions = {
  config: string;
  host?: string;
  port?: string;
  username?: string;
  password?: string;
  privateKey?: string;
  passphrase?: string;
  timeout?: string;
};

/**
 * @description Resolve the connection config from the config file, the environment and the global flags.
 * @description A missing config file is only fatal when it was named explicitly.
 */
export function resolveCliConfig(
  program: Command,
  logger: Logger = consoleLogger
): Readonly<ConnectionConfig> {
  const options = program.opts<GlobalOptions>();
  let raw: RawConfig = {};

  try {
    raw = loadConfigFile(options.config);
  } catch (error) {
    if (
      !(error instanceof ConfigNotFoundError) ||
      program.getOptionValueSource('config') !== 'default'
    ) {
      throw error;
    }
    logger.warn(
      `⚠️  ${options.config} not found, using options and environment variables only`
    );
  }

  const overrides: ConfigOverrides = {
    host: options.host,
    port: options.port,
    username: options.username,
    password: options.password,
    privateKeyPath: options.privateKey,
    passphrase: options.passphrase,
    timeout: options.timeout,
  };

  const config = resolveConnectionConfig(raw, process.env, overrides);

  if (config.privateKeyPath) {
    sanitizeSSHKeyPath(config.privateKeyPath, logger.warn);
  }

  return config;
}

export function printResult(result: ExecutionResult): void {
  if (result.stderr) {
    console.error(chalk.red(`STDERR: ${result.stderr}`));
  }
  if (result.stdout) {
    process.stdout.write(result.stdout);
  }
}

// a remote exit code becomes ours; -1 (no status) maps to a plain failure
export function exitWith(code: number): void {
  process.exitCode = code < 0 ? 1 : code;
}

export function reportError(error: unknown): never {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
  } else {
    console.error(chalk.red(`✗ Error: ${describeError(error)}`));
  }
  process.exit(1);
}

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}
