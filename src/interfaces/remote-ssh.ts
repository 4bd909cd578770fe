export interface SSHConnectionConfig {
  host: string;
  port?: number; // default 22
  username: string;

  // either password or privateKeyPath must be provided
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  readyTimeout?: number;
}

export interface ConnectionConfig extends SSHConnectionConfig {
  port: number;
  /**
   * @description Name of the persistent tmux session kept on the remote host.
   */
  tmuxSession: string;
  /**
   * @description Virtual environment used when a call does not name one.
   */
  venvName: string;
  readyTimeout: number;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

export interface ExecOptions {
  cwd?: string;
  stdin?: string;
  onStdout?: (chunk: Buffer) => void;
  onStderr?: (chunk: Buffer) => void;
}

export interface ExecResponse {
  stdout: string;
  stderr: string;
  /**
   * @description Null when the remote process ended without an exit status (killed by a signal).
   */
  code: number | null;
}

/**
 * Remote file access over the transport's SFTP sub-channel.
 */
export interface FileChannel {
  writeFile(remotePath: string, data: string | Buffer): Promise<void>;
  readFile(remotePath: string): Promise<Buffer>;
  upload(localPath: string, remotePath: string): Promise<void>;
  download(remotePath: string, localPath: string): Promise<void>;
  close(): void;
}

export interface SSHTransport {
  /** Open and authenticate the connection. */
  connect(config: SSHConnectionConfig): Promise<void>;

  /** Whether the underlying connection is still up. */
  isActive(): boolean;

  /** Run one command over a fresh channel; resolves once both streams have ended. */
  execCommand(command: string, options?: ExecOptions): Promise<ExecResponse>;

  openFileChannel(): Promise<FileChannel>;

  /** No-op round trip that keeps the connection from idling out. */
  sendKeepalive(): Promise<void>;

  dispose(): void;
}
