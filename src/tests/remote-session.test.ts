import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { RemoteSession } from '../classes/remote-session';
import {
  ConnectionFailedError,
  NotConnectedError,
  RemoteSessionError,
  TransferFailedError,
} from '../lib/errors';
import { ValidationError } from '../lib/sanitization';
import { FakeTransport } from './helpers/fake-transport';
import { MemoryLogger } from './helpers/memory-logger';
import { testConfig } from './helpers/fixtures';
import { captureError } from './helpers/capture-error';

const TMUX = 'tmux has-session -t remote 2>/dev/null || tmux new-session -d -s remote';

describe('RemoteSession', () => {
  let transport: FakeTransport;
  let logger: MemoryLogger;
  let session: RemoteSession;

  beforeEach(() => {
    transport = new FakeTransport();
    logger = new MemoryLogger();
    session = new RemoteSession(testConfig(), { transport, logger });
  });

  afterEach(async () => {
    await session.disconnect();
  });

  describe('connect', () => {
    it('should open the transport, the file channel and the tmux session', async () => {
      await session.connect();

      expect(session.connected).to.equal(true);
      expect(transport.connectedWith?.host).to.equal('remote.test');
      expect(transport.channel).to.not.be.null;
      expect(transport.commands).to.deep.equal([TMUX]);
    });

    it('should be a no-op when already connected', async () => {
      await session.connect();
      await session.connect();

      expect(transport.commands).to.deep.equal([TMUX]);
    });

    it('should stay disconnected when the transport fails', async () => {
      transport.connectError = new Error('Authentication failed');

      const error = await captureError(session.connect());

      expect(error)
        .to.be.instanceOf(ConnectionFailedError)
        .and.have.property(
          'message',
          'Failed to connect to tester@remote.test:22: Authentication failed'
        );

      expect(session.connected).to.equal(false);
      expect(transport.disposeCount).to.equal(1);
    });

    it('should release the transport when the file channel cannot be opened', async () => {
      transport.fileChannelError = new Error('subsystem request failed');

      const error = await captureError(session.connect());

      expect(error).to.be.instanceOf(ConnectionFailedError);

      expect(session.connected).to.equal(false);
      expect(transport.active).to.equal(false);
      expect(transport.commands).to.deep.equal([]);
    });

    it('should warn but stay connected when tmux is unavailable', async () => {
      transport.on(TMUX, { code: 127, stderr: 'tmux: command not found\n' });

      await session.connect();

      expect(session.connected).to.equal(true);
      expect(logger.lines).to.include(
        'warn: Could not ensure tmux session "remote": tmux: command not found'
      );
    });
  });

  describe('disconnect', () => {
    it('should close the file channel and the transport', async () => {
      await session.connect();
      await session.disconnect();

      expect(session.connected).to.equal(false);
      expect(transport.channel?.closed).to.equal(true);
      expect(transport.active).to.equal(false);
    });

    it('should be idempotent', async () => {
      await session.connect();
      await session.disconnect();
      await session.disconnect();

      expect(session.connected).to.equal(false);
    });

    it('should tolerate a file channel that is already closed', async () => {
      await session.connect();
      if (transport.channel) {
        transport.channel.closeError = new Error('channel closed');
      }

      await session.disconnect();

      expect(transport.active).to.equal(false);
      expect(logger.lines).to.include('debug: SFTP channel already closed: channel closed');
    });
  });

  describe('execute', () => {
    it('should fail with NotConnectedError without touching the transport', async () => {
      const spy = sinon.spy(transport, 'execCommand');

      const error = await captureError(session.execute('ls'));

      expect(error)
        .to.be.instanceOf(NotConnectedError)
        .and.have.property('message', 'Cannot execute command: session is not connected');
      expect(spy.called).to.equal(false);
    });

    it('should return stdout exactly, empty stderr and exit code 0', async () => {
      const payload = 'line one\n  line two  \n';
      transport.on('cat data.txt', { stdout: payload });
      await session.connect();

      const result = await session.execute('cat data.txt');

      expect(result.stdout).to.equal(payload);
      expect(Buffer.byteLength(result.stdout)).to.equal(Buffer.byteLength(payload));
      expect(result.stderr).to.equal('');
      expect(result.exitCode).to.equal(0);
    });

    it('should return non-zero exit codes as data', async () => {
      transport.on('false', { code: 1, stderr: 'boom\n' });
      await session.connect();

      const result = await session.execute('false');

      expect(result.exitCode).to.equal(1);
      expect(result.stderr).to.equal('boom\n');
    });

    it('should report -1 when the remote gives no exit status', async () => {
      transport.on('sleep 100', { code: null });
      await session.connect();

      const result = await session.execute('sleep 100');

      expect(result.exitCode).to.equal(-1);
    });

    it('should wrap transport errors', async () => {
      transport.on('ls', () => {
        throw new Error('Channel open failure');
      });
      await session.connect();

      const error = await captureError(session.execute('ls'));

      expect(error)
        .to.be.instanceOf(RemoteSessionError)
        .and.have.property('message', 'Error executing "ls": Channel open failure');
    });

    it('should fail after disconnect', async () => {
      await session.connect();
      await session.disconnect();

      expect(await captureError(session.execute('ls'))).to.be.instanceOf(
        NotConnectedError
      );
    });
  });

  describe('executeStreaming', () => {
    it('should forward chunks before the command finishes and return the exit code', async () => {
      const seen: string[] = [];
      let finished = false;

      transport.on('./long-job.sh', async (_command, options) => {
        options.onStdout?.(Buffer.from('step 1\n'));
        await new Promise((resolve) => setImmediate(resolve));
        options.onStdout?.(Buffer.from('step 2\n'));
        finished = true;
        return { stdout: 'step 1\nstep 2\n', stderr: '', code: 3 };
      });
      await session.connect();

      const exitCode = await session.executeStreaming('./long-job.sh', {
        onStdout: (chunk) => seen.push(`${finished ? 'after' : 'before'}:${chunk}`),
      });

      expect(exitCode).to.equal(3);
      expect(seen).to.deep.equal(['before:step 1\n', 'before:step 2\n']);
    });

    it('should write output to the logger by default', async () => {
      transport.on('echo hi', (_command, options) => {
        options.onStdout?.(Buffer.from('hi\n'));
        return { stdout: 'hi\n', stderr: '', code: 0 };
      });
      await session.connect();

      await session.executeStreaming('echo hi');

      expect(logger.output).to.deep.equal(['hi\n']);
    });

    it('should keep stderr apart from stdout by default', async () => {
      transport.on('make', (_command, options) => {
        options.onStdout?.(Buffer.from('building\n'));
        options.onStderr?.(Buffer.from('warning: unused\n'));
        return { stdout: 'building\n', stderr: 'warning: unused\n', code: 0 };
      });
      await session.connect();

      await session.executeStreaming('make');

      expect(logger.output).to.deep.equal(['building\n']);
      expect(logger.errorOutput).to.deep.equal(['warning: unused\n']);
    });
  });

  describe('executeScript', () => {
    it('should run every non-comment line as its own command', async () => {
      transport.on('pwd', { stdout: '/home/tester\n' });
      transport.on('ls missing', { code: 2, stderr: 'No such file\n' });
      await session.connect();

      const results = await session.executeScript(
        '# prepare\ncd /tmp\n\npwd\nls missing\n'
      );

      expect(transport.commands.slice(1)).to.deep.equal(['cd /tmp', 'pwd', 'ls missing']);
      expect(results.map((r) => r.exitCode)).to.deep.equal([0, 0, 2]);
      expect(logger.lines).to.deep.equal([
        'debug: Connected to tester@remote.test:22',
        'info: $ cd /tmp',
        'info: $ pwd',
        'info: $ ls missing',
        'error: STDERR: No such file\n',
      ]);
      expect(logger.output).to.deep.equal(['/home/tester\n']);
    });

    it('should require a connection even for an empty script', async () => {
      expect(await captureError(session.executeScript(''))).to.be.instanceOf(
        NotConnectedError
      );
    });
  });

  describe('virtual environments', () => {
    beforeEach(async () => {
      await session.connect();
    });

    it('should create the default venv', async () => {
      await session.createVenv();

      expect(transport.commands[1]).to.equal('python3 -m venv ml_env');
    });

    it('should install packages into the named venv', async () => {
      await session.installPackages(['numpy', 'pandas'], 'work_env');

      expect(transport.commands[1]).to.equal(
        '. work_env/bin/activate && pip install numpy pandas'
      );
    });

    it('should validate package names before running anything', async () => {
      expect(await captureError(session.installPackages(['--pre']))).to.be.instanceOf(
        ValidationError
      );

      expect(transport.commands).to.deep.equal([TMUX]);
    });

    it('should run a python file with streaming output', async () => {
      transport.on(/python 'train.py'$/, (_command, options) => {
        options.onStdout?.(Buffer.from('epoch 1\n'));
        return { stdout: 'epoch 1\n', stderr: '', code: 0 };
      });

      const exitCode = await session.runPythonFile('train.py');

      expect(exitCode).to.equal(0);
      expect(transport.commands[1]).to.equal(
        ". ml_env/bin/activate && python 'train.py'"
      );
      expect(logger.output).to.deep.equal(['epoch 1\n']);
    });

    it('should write code and then run it', async () => {
      await session.writeAndRun('job.py', 'print("ok")\n', 'work_env');

      expect(transport.remoteFiles.get('job.py')?.toString()).to.equal('print("ok")\n');
      expect(transport.commands[1]).to.equal(
        ". work_env/bin/activate && python 'job.py'"
      );
    });
  });

  describe('file transfer', () => {
    it('should require a connection', async () => {
      expect(await captureError(session.writeFile('a.txt', 'x'))).to.be.instanceOf(
        NotConnectedError
      );
    });

    it('should write strings as UTF-8 and read them back', async () => {
      await session.connect();

      await session.writeFile('notes.txt', 'héllo');

      expect(transport.remoteFiles.get('notes.txt')).to.deep.equal(
        Buffer.from('héllo', 'utf8')
      );
      expect(await session.readFile('notes.txt')).to.equal('héllo');
    });

    it('should pass binary payloads through unchanged', async () => {
      await session.connect();
      const payload = Buffer.from([0x00, 0xff, 0x10]);

      await session.writeFile('blob.bin', payload);

      expect(await session.readFileBuffer('blob.bin')).to.deep.equal(payload);
    });

    it('should upload and download files', async () => {
      await session.connect();
      transport.localFiles.set('/local/in.csv', Buffer.from('a,b\n'));

      await session.uploadFile('/local/in.csv', 'data/in.csv');
      await session.downloadFile('data/in.csv', '/local/out.csv');

      expect(transport.remoteFiles.get('data/in.csv')?.toString()).to.equal('a,b\n');
      expect(transport.localFiles.get('/local/out.csv')?.toString()).to.equal('a,b\n');
    });

    it('should raise TransferFailedError when the channel fails', async () => {
      await session.connect();

      const error = await captureError(session.readFile('missing.txt'));

      expect(error)
        .to.be.instanceOf(TransferFailedError)
        .and.have.property(
          'message',
          'Error reading remote file missing.txt: No such file: missing.txt'
        );
    });
  });

  describe('server info', () => {
    it('should report hostname and uptime', async () => {
      transport.on('hostname', { stdout: 'box-1\n' });
      transport.on('uptime', { stdout: ' 10:00 up 1 day\n' });
      await session.connect();

      expect(await session.getServerInfo()).to.deep.equal({
        hostname: 'box-1',
        uptime: '10:00 up 1 day',
      });
    });

    it('should report a failed connection test as false', async () => {
      expect(await session.testConnection()).to.equal(false);

      await session.connect();
      expect(await session.testConnection()).to.equal(true);
    });
  });
});
