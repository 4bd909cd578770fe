import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { withSession } from '../../classes/session-scope';
import { sanitizeLocalPath, sanitizeRemotePath } from '../../lib/sanitization';
import { readStdin, reportError, resolveCliConfig } from '../context';

export function registerFileCommands(program: Command) {
  const fileCmd = program
    .command('file')
    .description('Remote file transfer commands');

  // example: rsh file put ./data.csv data/data.csv
  fileCmd
    .command('put')
    .description('Upload a local file')
    .argument('<local>', 'Local file')
    .argument('<remote>', 'Remote destination')
    .action(async (local: string, remote: string) => {
      try {
        const localPath = sanitizeLocalPath(local, 'Local file');
        if (!fs.existsSync(localPath)) {
          throw new Error(`Local file not found: ${localPath}`);
        }
        const remotePath = sanitizeRemotePath(remote, 'Remote file');
        const config = resolveCliConfig(program);

        await withSession(config, (session) =>
          session.uploadFile(localPath, remotePath)
        );
        console.log(chalk.green(`✓ Uploaded ${localPath} → ${remotePath}`));
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh file get results/out.csv ./out.csv
  fileCmd
    .command('get')
    .description('Download a remote file')
    .argument('<remote>', 'Remote file')
    .argument('<local>', 'Local destination')
    .action(async (remote: string, local: string) => {
      try {
        const remotePath = sanitizeRemotePath(remote, 'Remote file');
        const localPath = sanitizeLocalPath(local, 'Local file');
        const config = resolveCliConfig(program);

        await withSession(config, (session) =>
          session.downloadFile(remotePath, localPath)
        );
        console.log(chalk.green(`✓ Downloaded ${remotePath} → ${localPath}`));
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh file read notes.txt
  fileCmd
    .command('read')
    .description('Print a remote text file')
    .argument('<remote>', 'Remote file')
    .action(async (remote: string) => {
      try {
        const remotePath = sanitizeRemotePath(remote, 'Remote file');
        const config = resolveCliConfig(program);

        const content = await withSession(config, (session) =>
          session.readFile(remotePath)
        );
        process.stdout.write(content);
      } catch (error) {
        reportError(error);
      }
    });

  // example: echo "hello" | rsh file write notes.txt
  fileCmd
    .command('write')
    .description('Write stdin to a remote file')
    .argument('<remote>', 'Remote file')
    .action(async (remote: string) => {
      try {
        const remotePath = sanitizeRemotePath(remote, 'Remote file');
        const config = resolveCliConfig(program);
        const content = await readStdin();

        await withSession(config, (session) =>
          session.writeFile(remotePath, content)
        );
        console.log(chalk.green(`✓ Wrote ${Buffer.byteLength(content)} bytes to ${remotePath}`));
      } catch (error) {
        reportError(error);
      }
    });
}
