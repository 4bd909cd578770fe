import { SSHTransport } from './remote-ssh';
import { Logger } from '../lib/logger';

export interface RemoteSessionOptions {
  /**
   * @description The transport to use. Defaults to a node-ssh backed transport.
   */
  transport?: SSHTransport;
  /**
   * @description The interval in milliseconds between keepalive checks.
   */
  keepaliveIntervalMs?: number;
  /**
   * @description Where command output and progress messages go.
   */
  logger?: Logger;
}

export interface StreamOptions {
  stdin?: string;
  onStdout?: (chunk: Buffer) => void;
  onStderr?: (chunk: Buffer) => void;
}

export interface VenvSetupOptions {
  /**
   * @description The name (or path) of the virtual environment.
   */
  name?: string;
  /**
   * @description The packages to install.
   */
  packages?: string[];
  /**
   * @description Remove the environment first and build it from scratch.
   */
  forceReinstall?: boolean;
}

export interface VenvSetupResult {
  name: string;
  created: boolean;
  installExitCode: number;
  installed: string[];
}

export interface ServerInfo {
  hostname: string;
  uptime: string;
}

export type CellMode =
  | { kind: 'shell' }
  | { kind: 'python'; venv?: string; persistentFile?: string };
