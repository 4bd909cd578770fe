import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import * as fs from 'fs';
import { withSession } from '../../classes/session-scope';
import { setupVenv } from '../../classes/venv-setup';
import { sanitizeLocalPath } from '../../lib/sanitization';
import { exitWith, reportError, resolveCliConfig } from '../context';

export function registerVenvCommands(program: Command) {
  const venvCmd = program
    .command('venv')
    .description('Remote Python virtual environment commands');

  // example: rsh venv setup --name ml_env --packages numpy scipy --force
  venvCmd
    .command('setup')
    .description('Create a virtual environment if needed, upgrade pip, install and verify packages')
    .option('-n, --name <name>', 'Virtual environment name (default: venv_name from config)')
    .option('-p, --packages <packages...>', 'Packages to install')
    .option('--force', 'Remove the existing environment first', false)
    .action(
      async (options: { name?: string; packages?: string[]; force: boolean }) => {
        try {
          const config = resolveCliConfig(program);
          const result = await withSession(config, (session) =>
            setupVenv(session, {
              name: options.name,
              packages: options.packages,
              forceReinstall: options.force,
            })
          );

          const table = new Table({ head: ['Installed packages'] });
          for (const line of result.installed) {
            table.push([line]);
          }
          console.log(table.toString());

          console.log(chalk.bold('\nUsage:'));
          console.log(`   rsh cell python:${result.name}`);
          console.log(`   rsh cell python:${result.name} persistent script.py`);
          exitWith(result.installExitCode);
        } catch (error) {
          reportError(error);
        }
      }
    );

  // example: rsh venv create ml_env
  venvCmd
    .command('create')
    .description('Create a virtual environment')
    .argument('[name]', 'Virtual environment name (default: venv_name from config)')
    .action(async (name?: string) => {
      try {
        const config = resolveCliConfig(program);
        const result = await withSession(config, (session) =>
          session.createVenv(name)
        );
        exitWith(result.exitCode);
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh venv install numpy pandas --venv ml_env
  venvCmd
    .command('install')
    .description('Install packages into a virtual environment')
    .argument('<packages...>', 'Packages to install')
    .option('--venv <name>', 'Virtual environment name (default: venv_name from config)')
    .action(async (packages: string[], options: { venv?: string }) => {
      try {
        const config = resolveCliConfig(program);
        const result = await withSession(config, (session) =>
          session.installPackages(packages, options.venv)
        );
        exitWith(result.exitCode);
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh run train.py --venv ml_env
  program
    .command('run')
    .description('Run a remote Python file inside a virtual environment, streaming its output')
    .argument('<remote-path>', 'Remote Python file')
    .option('--venv <name>', 'Virtual environment name (default: venv_name from config)')
    .action(async (remotePath: string, options: { venv?: string }) => {
      try {
        const config = resolveCliConfig(program);
        const exitCode = await withSession(config, (session) =>
          session.runPythonFile(remotePath, options.venv)
        );
        exitWith(exitCode);
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh write-run ./train.py train.py --venv ml_env
  program
    .command('write-run')
    .description('Write a local Python file to the remote host and run it')
    .argument('<local-path>', 'Local Python file')
    .argument('<remote-path>', 'Remote destination')
    .option('--venv <name>', 'Virtual environment name (default: venv_name from config)')
    .action(
      async (localPath: string, remotePath: string, options: { venv?: string }) => {
        try {
          const config = resolveCliConfig(program);
          const code = fs.readFileSync(
            sanitizeLocalPath(localPath, 'Local file'),
            'utf8'
          );
          const exitCode = await withSession(config, (session) =>
            session.writeAndRun(remotePath, code, options.venv)
          );
          exitWith(exitCode);
        } catch (error) {
          reportError(error);
        }
      }
    );
}
