import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { withSession } from '../../classes/session-scope';
import { parseCellMode, runCell } from '../../classes/cell-runner';
import { sanitizeLocalPath } from '../../lib/sanitization';
import {
  exitWith,
  printResult,
  readStdin,
  reportError,
  resolveCliConfig,
} from '../context';

export function registerExecCommands(program: Command) {
  // example: rsh exec ls -la
  program
    .command('exec')
    .description('Run a command remotely and print its output when it finishes')
    .argument('<command...>', 'Command to execute')
    .action(async (command: string[]) => {
      try {
        const config = resolveCliConfig(program);
        const result = await withSession(config, (session) =>
          session.execute(command.join(' '))
        );
        printResult(result);
        exitWith(result.exitCode);
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh stream "for i in 1 2 3; do echo $i; sleep 1; done"
  program
    .command('stream')
    .description('Run a command remotely, printing output as it arrives')
    .argument('<command...>', 'Command to execute')
    .action(async (command: string[]) => {
      try {
        const config = resolveCliConfig(program);
        const exitCode = await withSession(config, (session) =>
          session.executeStreaming(command.join(' '))
        );
        exitWith(exitCode);
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh script ./setup.sh
  program
    .command('script')
    .description('Run a local script on the remote host, one line at a time')
    .argument('<file>', 'Local script file')
    .action(async (file: string) => {
      try {
        const config = resolveCliConfig(program);
        const script = fs.readFileSync(sanitizeLocalPath(file, 'Script file'), 'utf8');
        const results = await withSession(config, (session) =>
          session.executeScript(script)
        );
        const failed = results.filter((result) => result.exitCode !== 0);
        if (failed.length > 0) {
          console.log(chalk.yellow(`⚠️  ${failed.length} of ${results.length} commands failed`));
          exitWith(1);
        }
      } catch (error) {
        reportError(error);
      }
    });

  // example: echo 'print("hi")' | rsh cell python:ml_env persistent notes.py
  program
    .command('cell')
    .description(
      'Run a cell body read from stdin: shell (default), python, python:VENV, [..] persistent [FILE]'
    )
    .argument('[mode...]', 'Cell mode', [])
    .option('-f, --file <path>', 'Read the cell body from a local file instead of stdin')
    .action(async (mode: string[], options: { file?: string }) => {
      try {
        const cellMode = parseCellMode(mode.join(' '));
        const config = resolveCliConfig(program);
        const body = options.file
          ? fs.readFileSync(sanitizeLocalPath(options.file, 'Cell file'), 'utf8')
          : await readStdin();

        const result = await withSession(config, (session) =>
          runCell(session, cellMode, body)
        );
        printResult(result);
        exitWith(result.exitCode);
      } catch (error) {
        reportError(error);
      }
    });
}
