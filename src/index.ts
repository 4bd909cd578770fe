export * from './interfaces';
export { RemoteSession } from './classes/remote-session';
export { NodeSSHTransport, SftpFileChannel } from './classes/ssh-transport';
export type { SftpSession } from './classes/ssh-transport';
export { KeepaliveTask, DEFAULT_KEEPALIVE_INTERVAL_MS } from './classes/keepalive';
export { setupVenv, DEFAULT_PACKAGES } from './classes/venv-setup';
export { parseCellMode, runCell, DEFAULT_PERSISTENT_FILE } from './classes/cell-runner';
export { withSession } from './classes/session-scope';
export {
  parseConfigText,
  serializeConfig,
  loadConfigFile,
  resolveConnectionConfig,
  DEFAULT_CONFIG_FILE,
} from './lib/config';
export type { RawConfig, ConfigOverrides } from './lib/config';
export * from './lib/errors';
export { ValidationError } from './lib/sanitization';
export { consoleLogger } from './lib/logger';
export type { Logger } from './lib/logger';
