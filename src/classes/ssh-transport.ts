import { NodeSSH } from 'node-ssh';
import type { SFTPWrapper } from 'ssh2';
import {
  ExecOptions,
  ExecResponse,
  FileChannel,
  SSHConnectionConfig,
  SSHTransport,
} from '../interfaces';

/**
 * The parts of an ssh2 SFTP session the file channel calls.
 */
export type SftpSession = Pick<
  SFTPWrapper,
  'writeFile' | 'readFile' | 'fastPut' | 'fastGet' | 'end'
>;

/**
 * SFTP sub-channel of a node-ssh connection, promisified.
 */
export class SftpFileChannel implements FileChannel {
  constructor(private readonly sftp: SftpSession) {}

  writeFile(remotePath: string, data: string | Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.writeFile(remotePath, data, (err) =>
        err ? reject(err) : resolve()
      );
    });
  }

  readFile(remotePath: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      this.sftp.readFile(remotePath, (err, data) =>
        err ? reject(err) : resolve(data)
      );
    });
  }

  upload(localPath: string, remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastPut(localPath, remotePath, (err) =>
        err ? reject(err) : resolve()
      );
    });
  }

  download(remotePath: string, localPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastGet(remotePath, localPath, (err) =>
        err ? reject(err) : resolve()
      );
    });
  }

  close(): void {
    this.sftp.end();
  }
}

export class NodeSSHTransport implements SSHTransport {
  private ssh: NodeSSH;
  private failure: Error | null = null;

  constructor(ssh: NodeSSH = new NodeSSH()) {
    this.ssh = ssh;
  }

  async connect(config: SSHConnectionConfig): Promise<void> {
    await this.ssh.connect({
      host: config.host,
      port: config.port ?? 22,
      username: config.username,
      password: config.password,
      privateKeyPath: config.privateKeyPath,
      passphrase: config.passphrase,
      readyTimeout: config.readyTimeout,
    });
    this.failure = null;

    // node-ssh drops its own error listener once the client is ready
    this.ssh.connection?.on('error', (error: Error) => {
      this.failure = error;
      this.ssh.dispose();
    });
  }

  /**
   * Last socket error seen after the connection became ready.
   */
  get lastError(): Error | null {
    return this.failure;
  }

  isActive(): boolean {
    return this.failure === null && this.ssh.isConnected();
  }

  async execCommand(
    command: string,
    options: ExecOptions = {}
  ): Promise<ExecResponse> {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const result = await this.ssh.execCommand(command, {
      cwd: options.cwd,
      stdin: options.stdin,
      onStdout: (chunk) => {
        stdout.push(chunk);
        options.onStdout?.(chunk);
      },
      onStderr: (chunk) => {
        stderr.push(chunk);
        options.onStderr?.(chunk);
      },
      noTrim: true,
    });

    // decoded once, so a character split across packets stays intact
    return {
      stdout: Buffer.concat(stdout).toString('utf8'),
      stderr: Buffer.concat(stderr).toString('utf8'),
      code: result.code,
    };
  }

  async openFileChannel(): Promise<FileChannel> {
    const sftp = await this.ssh.requestSFTP();
    return new SftpFileChannel(sftp);
  }

  async sendKeepalive(): Promise<void> {
    // ':' is the POSIX shell no-op
    await this.ssh.execCommand(':');
  }

  dispose(): void {
    this.ssh.dispose();
  }
}
