import {
  ConnectionConfig,
  ExecutionResult,
  FileChannel,
  RemoteSessionOptions,
  ServerInfo,
  SSHTransport,
  StreamOptions,
} from '../interfaces';
import { NodeSSHTransport } from './ssh-transport';
import { KeepaliveTask, DEFAULT_KEEPALIVE_INTERVAL_MS } from './keepalive';
import { Logger, consoleLogger } from '../lib/logger';
import {
  ConnectionFailedError,
  NotConnectedError,
  RemoteSessionError,
  TransferFailedError,
  describeError,
} from '../lib/errors';
import {
  createVenvCommand,
  ensureTmuxSessionCommand,
  installPackagesCommand,
  runPythonFileCommand,
  splitScript,
} from '../lib/shell';
import {
  sanitizePackageNames,
  sanitizeRemotePath,
  sanitizeVenvName,
} from '../lib/sanitization';

/**
 * One SSH connection plus its SFTP channel, a tmux session kept alive on the
 * remote side, and a keepalive task. Not meant to be shared by concurrent callers.
 */
export class RemoteSession {
  readonly config: Readonly<ConnectionConfig>;
  private transport: SSHTransport;
  private fileChannel: FileChannel | null = null;
  private keepalive: KeepaliveTask | null = null;
  private isConnected = false;
  private logger: Logger;
  private keepaliveIntervalMs: number;

  constructor(
    config: Readonly<ConnectionConfig>,
    options: RemoteSessionOptions = {}
  ) {
    this.config = config;
    this.transport = options.transport ?? new NodeSSHTransport();
    this.logger = options.logger ?? consoleLogger;
    this.keepaliveIntervalMs =
      options.keepaliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS;
  }

  get connected(): boolean {
    return this.isConnected;
  }

  /**
   * Connect to the remote server, open the SFTP channel and make sure the tmux session exists
   */
  async connect(): Promise<void> {
    if (this.isConnected) return;

    const { username, host, port } = this.config;

    try {
      await this.transport.connect(this.config);
      this.fileChannel = await this.transport.openFileChannel();
      await this.ensureTmuxSession();
    } catch (error) {
      this.release();
      throw new ConnectionFailedError(
        `Failed to connect to ${username}@${host}:${port}: ${describeError(error)}`,
        { cause: error }
      );
    }

    this.isConnected = true;
    this.startKeepalive();
    this.logger.debug(`Connected to ${username}@${host}:${port}`);
  }

  /**
   * Disconnect from the remote server. Safe to call more than once.
   */
  async disconnect(): Promise<void> {
    this.isConnected = false;
    this.stopKeepalive();
    this.release();
  }

  /**
   * Run a command and wait for both output streams and the exit code
   */
  async execute(
    command: string,
    options: { stdin?: string; cwd?: string } = {}
  ): Promise<ExecutionResult> {
    this.requireConnection('execute command');
    const startTime = Date.now();

    try {
      const result = await this.transport.execCommand(command, options);

      return {
        exitCode: result.code ?? -1,
        stdout: result.stdout,
        stderr: result.stderr,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      throw new RemoteSessionError(
        `Error executing "${command}": ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Run a command, forwarding output as it arrives. Resolves to the exit code.
   */
  async executeStreaming(
    command: string,
    options: StreamOptions = {}
  ): Promise<number> {
    this.requireConnection('execute command');

    try {
      const result = await this.transport.execCommand(command, {
        stdin: options.stdin,
        onStdout: options.onStdout ?? ((chunk) => this.logger.write(chunk)),
        onStderr: options.onStderr ?? ((chunk) => this.logger.writeError(chunk)),
      });
      return result.code ?? -1;
    } catch (error) {
      throw new RemoteSessionError(
        `Error executing "${command}": ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Run each non-blank, non-comment line as its own command.
   * Only state the remote shell itself keeps (cwd, files) carries over between lines.
   */
  async executeScript(script: string): Promise<ExecutionResult[]> {
    this.requireConnection('execute script');

    const results: ExecutionResult[] = [];
    for (const line of splitScript(script)) {
      results.push(await this.runLine(line));
    }
    return results;
  }

  async createVenv(name: string = this.config.venvName): Promise<ExecutionResult> {
    this.requireConnection('create virtual environment');
    return this.runLine(createVenvCommand(sanitizeVenvName(name)));
  }

  async installPackages(
    packages: string[],
    venv: string = this.config.venvName
  ): Promise<ExecutionResult> {
    this.requireConnection('install packages');
    return this.runLine(
      installPackagesCommand(sanitizeVenvName(venv), sanitizePackageNames(packages))
    );
  }

  async runPythonFile(
    remotePath: string,
    venv: string = this.config.venvName
  ): Promise<number> {
    this.requireConnection('run python file');
    return this.executeStreaming(
      runPythonFileCommand(
        sanitizeRemotePath(remotePath, 'Python file'),
        sanitizeVenvName(venv)
      )
    );
  }

  async writeAndRun(
    remotePath: string,
    code: string,
    venv: string = this.config.venvName
  ): Promise<number> {
    await this.writeFile(remotePath, code);
    return this.runPythonFile(remotePath, venv);
  }

  async writeFile(remotePath: string, content: string | Buffer): Promise<void> {
    const channel = this.requireFileChannel('write file');
    const data = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;

    try {
      await channel.writeFile(remotePath, data);
    } catch (error) {
      throw new TransferFailedError(
        `Error writing remote file ${remotePath}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async readFile(remotePath: string): Promise<string> {
    const data = await this.readFileBuffer(remotePath);
    return data.toString('utf8');
  }

  async readFileBuffer(remotePath: string): Promise<Buffer> {
    const channel = this.requireFileChannel('read file');

    try {
      return await channel.readFile(remotePath);
    } catch (error) {
      throw new TransferFailedError(
        `Error reading remote file ${remotePath}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Transfer a local file to the remote server
   */
  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    const channel = this.requireFileChannel('upload file');

    try {
      await channel.upload(localPath, remotePath);
    } catch (error) {
      throw new TransferFailedError(
        `Error uploading file to remote server: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async downloadFile(remotePath: string, localPath: string): Promise<void> {
    const channel = this.requireFileChannel('download file');

    try {
      await channel.download(remotePath, localPath);
    } catch (error) {
      throw new TransferFailedError(
        `Error downloading file from remote server: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Get remote server information
   */
  async getServerInfo(): Promise<ServerInfo> {
    const hostnameResult = await this.execute('hostname');
    const uptimeResult = await this.execute('uptime');

    return {
      hostname: hostnameResult.stdout.trim(),
      uptime: uptimeResult.stdout.trim(),
    };
  }

  /**
   * Test the connection to the remote server
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.execute('echo "Connection test successful"');
      return result.exitCode === 0;
    } catch (error) {
      this.logger.debug(`Connection test failed: ${describeError(error)}`);
      return false;
    }
  }

  private async runLine(command: string): Promise<ExecutionResult> {
    this.logger.info(`$ ${command}`);
    const result = await this.execute(command);

    if (result.stdout) {
      this.logger.write(result.stdout);
    }
    if (result.stderr) {
      this.logger.error(`STDERR: ${result.stderr}`);
    }

    return result;
  }

  private async ensureTmuxSession(): Promise<void> {
    const result = await this.transport.execCommand(
      ensureTmuxSessionCommand(this.config.tmuxSession)
    );

    if (result.code !== 0) {
      this.logger.warn(
        `Could not ensure tmux session "${this.config.tmuxSession}": ${result.stderr.trim() || `exit code ${result.code}`}`
      );
    }
  }

  private startKeepalive(): void {
    const task = new KeepaliveTask(this.transport, {
      intervalMs: this.keepaliveIntervalMs,
      onLost: (reason) => {
        if (this.keepalive !== task) return;
        this.logger.warn(`Connection lost: ${reason.message}`);
        this.isConnected = false;
        this.keepalive = null;
        this.release();
      },
    });
    this.keepalive = task;
    task.start();
  }

  private stopKeepalive(): void {
    if (this.keepalive) {
      this.keepalive.stop();
      this.keepalive = null;
    }
  }

  // SFTP channel first, then the transport; either may already be closed
  private release(): void {
    if (this.fileChannel) {
      const channel = this.fileChannel;
      this.fileChannel = null;
      try {
        channel.close();
      } catch (error) {
        this.logger.debug(`SFTP channel already closed: ${describeError(error)}`);
      }
    }

    try {
      this.transport.dispose();
    } catch (error) {
      this.logger.debug(`Transport already closed: ${describeError(error)}`);
    }
  }

  private requireConnection(operation: string): void {
    if (!this.isConnected) {
      throw new NotConnectedError(operation);
    }
  }

  private requireFileChannel(operation: string): FileChannel {
    this.requireConnection(operation);
    if (!this.fileChannel) {
      throw new NotConnectedError(operation);
    }
    return this.fileChannel;
  }
}
