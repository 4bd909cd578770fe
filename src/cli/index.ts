#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerConnectionCommands } from './commands/connection';
import { registerExecCommands } from './commands/exec';
import { registerVenvCommands } from './commands/venv';
import { registerFileCommands } from './commands/file';
import { DEFAULT_CONFIG_FILE } from '../lib/config';
import chalk from 'chalk';

const program = new Command();

program
  .name('rsh')
  .description('Remote Shell - run commands, Python and file transfers on a remote host over SSH')
  .option('-c, --config <path>', 'Connection config file', DEFAULT_CONFIG_FILE)
  .option('-H, --host <host>', 'Remote server hostname or IP address')
  .option('-u, --username <username>', 'SSH username')
  .option('-P, --port <port>', 'SSH port (default: 22)')
  .option('--password <password>', 'SSH password (not recommended)')
  .option('--private-key <path>', 'Path to private key file')
  .option('--passphrase <passphrase>', 'Passphrase for private key')
  .option('--timeout <seconds>', 'Connection timeout in seconds (default: 10)');

registerConnectionCommands(program);
registerExecCommands(program);
registerVenvCommands(program);
registerFileCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
