import * as path from 'path';
import * as fs from 'fs';

/**
 * Sanitization utilities for config values and remote-bound arguments
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const CONTROL_CHARS = /[\x00-\x1F\x7F]/;

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  const num = parseInt(trimmed, 10);

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  // hostnames, IPv4, and bare IPv6 literals
  const hostnameRegex = /^[a-zA-Z0-9.-]+$/;
  const ipv6Regex = /^[0-9a-fA-F:]+$/;

  if (!hostnameRegex.test(trimmed) && !ipv6Regex.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  if (!/^[a-zA-Z_][a-zA-Z0-9_.-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  return trimmed;
}

/**
 * Validates tmux session names
 */
export function sanitizeSessionName(name: string): string {
  const trimmed = (name ?? '').trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Session name cannot be empty');
  }

  if (trimmed.length > 64) {
    throw new ValidationError('Session name cannot exceed 64 characters');
  }

  // tmux treats ':' and '.' specially in targets
  if (!/^[a-zA-Z0-9_-]+$/.test(trimmed)) {
    throw new ValidationError(
      'Session name can only contain letters, numbers, hyphens, and underscores'
    );
  }

  return trimmed;
}

/**
 * Validates paths that are sent to the remote host
 */
export function sanitizeRemotePath(remotePath: string, fieldName: string): string {
  if (!remotePath || typeof remotePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = remotePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.length > 1024) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  if (CONTROL_CHARS.test(trimmed)) {
    throw new ValidationError(`${fieldName} contains invalid control characters`);
  }

  return trimmed;
}

/**
 * Validates virtual environment names. A venv may be a nested path but never climbs out of it.
 */
export function sanitizeVenvName(name: string): string {
  const sanitized = sanitizeRemotePath(name, 'Virtual environment name');

  if (sanitized.split('/').includes('..')) {
    throw new ValidationError(
      'Virtual environment name contains invalid path traversal'
    );
  }

  if (sanitized.startsWith('-')) {
    throw new ValidationError('Virtual environment name cannot start with "-"');
  }

  return sanitized.replace(/\/+$/, '');
}

/**
 * Validates package specifiers handed to pip
 */
export function sanitizePackageNames(packages: string[]): string[] {
  if (!Array.isArray(packages) || packages.length === 0) {
    throw new ValidationError('At least one package is required');
  }

  return packages.map((pkg, index) => {
    if (typeof pkg !== 'string') {
      throw new ValidationError(`Package ${index} must be a string`);
    }

    const trimmed = pkg.trim();

    if (trimmed.length === 0) {
      throw new ValidationError(`Package ${index} cannot be empty`);
    }

    if (/\s/.test(trimmed) || CONTROL_CHARS.test(trimmed)) {
      throw new ValidationError(
        `Package ${index} cannot contain whitespace or control characters`
      );
    }

    // keeps pip from reading a package as an option
    if (trimmed.startsWith('-')) {
      throw new ValidationError(`Package ${index} cannot start with "-"`);
    }

    return trimmed;
  });
}

/**
 * Validates and sanitizes local file paths
 */
export function sanitizeLocalPath(filePath: string, fieldName: string): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  return path.resolve(trimmed);
}

/**
 * Validates SSH key file path and permissions
 */
export function sanitizeSSHKeyPath(
  keyPath: string,
  warn: (message: string) => void = console.warn
): string {
  const sanitized = sanitizeLocalPath(keyPath, 'SSH key path');

  let stats: fs.Stats;
  try {
    stats = fs.statSync(sanitized);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError('SSH key file does not exist');
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  // Check file permissions (should not be group or world readable)
  const mode = stats.mode & parseInt('777', 8);
  if (mode & parseInt('044', 8)) {
    warn(
      'Warning: SSH key file is readable by others, consider changing permissions'
    );
  }

  return sanitized;
}
