import { VenvSetupOptions, VenvSetupResult } from '../interfaces';
import { RemoteSession } from './remote-session';
import { Logger, consoleLogger } from '../lib/logger';
import {
  createVenvCommand,
  directoryExistsCommand,
  removeDirectoryCommand,
  upgradePipCommand,
  verifyPackagesCommand,
  installPackagesCommand,
} from '../lib/shell';
import { sanitizePackageNames, sanitizeVenvName } from '../lib/sanitization';
import { RemoteSessionError } from '../lib/errors';

export const DEFAULT_PACKAGES = ['numpy', 'pandas', 'matplotlib'];

/**
 * Build (or rebuild) a virtual environment on the remote host and install packages into it.
 *
 * Steps: optional removal, create when missing, upgrade pip, install (streamed), verify.
 */
export async function setupVenv(
  session: RemoteSession,
  options: VenvSetupOptions = {},
  logger: Logger = consoleLogger
): Promise<VenvSetupResult> {
  const name = sanitizeVenvName(options.name ?? session.config.venvName);
  const packages = sanitizePackageNames(options.packages ?? DEFAULT_PACKAGES);

  logger.info(`Setting up virtual environment: ${name}`);

  if (options.forceReinstall) {
    logger.info('Removing existing virtual environment...');
    await session.execute(removeDirectoryCommand(name));
    logger.success('✓ Cleaned up old environment');
  }

  logger.info('Checking for existing virtual environment...');
  const check = await session.execute(directoryExistsCommand(name));
  const exists = check.stdout.trim() === 'exists';
  let created = false;

  if (exists) {
    logger.success(`✓ Virtual environment already exists: ${name}`);
  } else {
    logger.info(`Creating new virtual environment: ${name}`);
    const result = await session.execute(createVenvCommand(name));
    if (result.exitCode !== 0) {
      throw new RemoteSessionError(
        `Failed to create virtual environment ${name}: ${result.stderr.trim()}`
      );
    }
    created = true;
    logger.success('✓ Virtual environment created');
  }

  logger.info('Upgrading pip...');
  const upgrade = await session.execute(upgradePipCommand(name));
  if (upgrade.exitCode === 0) {
    logger.success('✓ Pip upgraded');
  } else {
    logger.warn(`Pip upgrade exited with code ${upgrade.exitCode}`);
  }

  logger.info(`Installing: ${packages.join(' ')}`);
  const installExitCode = await session.executeStreaming(
    installPackagesCommand(name, packages)
  );

  logger.info('Verifying installation...');
  const verify = await session.execute(verifyPackagesCommand(name, packages));
  const installed = verify.stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (installExitCode === 0) {
    logger.success(`✓ Virtual environment setup complete: ${name}`);
  } else {
    logger.error(`✗ Package installation exited with code ${installExitCode}`);
  }

  return { name, created, installExitCode, installed };
}
