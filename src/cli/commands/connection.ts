import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { withSession } from '../../classes/session-scope';
import { resolveCliConfig, reportError } from '../context';

export function registerConnectionCommands(program: Command) {
  // example: rsh --host 127.0.0.1 --username user --password password --port 2222 test
  program
    .command('test')
    .description('Test the SSH connection to the remote server')
    .action(async () => {
      console.log(chalk.bold('🔐 Testing SSH Connection...'));

      try {
        const config = resolveCliConfig(program);
        console.log(
          chalk.dim(`Connecting to ${config.username}@${config.host}:${config.port}\n`)
        );

        if (config.password) {
          console.log(chalk.yellow('⚠️  Using password authentication'));
        } else {
          console.log(chalk.blue('🔑 Using private key authentication'));
        }

        await withSession(config, async (session) => {
          console.log(chalk.dim('Testing connection...'));
          const isConnected = await session.testConnection();

          if (!isConnected) {
            console.log(chalk.red('❌ SSH connection test failed'));
            process.exitCode = 1;
            return;
          }

          console.log(chalk.green('✅ SSH connection test successful!'));

          const serverInfo = await session.getServerInfo();
          const table = new Table({ head: ['Hostname', 'Uptime'] });
          table.push([serverInfo.hostname, serverInfo.uptime]);
          console.log(chalk.dim('\n📋 Server Information:'));
          console.log(table.toString());
        });

        console.log(chalk.dim('Connection closed'));
      } catch (error) {
        reportError(error);
      }
    });

  // example: rsh --config ./connection_config.txt config
  program
    .command('config')
    .description('Show the resolved connection configuration')
    .action(() => {
      try {
        const config = resolveCliConfig(program);

        const table = new Table({
          head: ['Setting', 'Value'],
          colWidths: [16, 40],
        });
        table.push(
          ['host', config.host],
          ['port', String(config.port)],
          ['username', config.username],
          ['password', config.password ? '********' : chalk.dim('(none)')],
          ['key file', config.privateKeyPath ?? chalk.dim('(none)')],
          ['tmux session', config.tmuxSession],
          ['venv', config.venvName],
          ['timeout', `${config.readyTimeout / 1000}s`]
        );

        console.log(table.toString());
      } catch (error) {
        reportError(error);
      }
    });
}
