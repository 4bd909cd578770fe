import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { KeepaliveTask } from '../classes/keepalive';
import { RemoteSession } from '../classes/remote-session';
import { KeepaliveLostError, NotConnectedError } from '../lib/errors';
import { FakeTransport } from './helpers/fake-transport';
import { MemoryLogger } from './helpers/memory-logger';
import { testConfig } from './helpers/fixtures';
import { captureError } from './helpers/capture-error';

const INTERVAL = 60000;

// setImmediate stays real so pending promise chains can settle between ticks
const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('Keepalive', () => {
  let clock: sinon.SinonFakeTimers;
  let transport: FakeTransport;

  beforeEach(async () => {
    clock = sinon.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    transport = new FakeTransport();
    await transport.connect(testConfig());
  });

  afterEach(() => {
    clock.restore();
  });

  describe('KeepaliveTask', () => {
    it('should ping the transport once per interval', async () => {
      const onLost = sinon.spy();
      const task = new KeepaliveTask(transport, { intervalMs: INTERVAL, onLost });
      task.start();

      await clock.tickAsync(INTERVAL - 1);
      expect(transport.keepalives).to.equal(0);

      await clock.tickAsync(1);
      await flush();
      await clock.tickAsync(INTERVAL);
      await flush();

      expect(transport.keepalives).to.equal(2);
      expect(onLost.called).to.equal(false);
      task.stop();
    });

    it('should report loss once and stop when the transport is inactive', async () => {
      const onLost = sinon.spy();
      const task = new KeepaliveTask(transport, { intervalMs: INTERVAL, onLost });
      task.start();
      transport.active = false;

      await clock.tickAsync(INTERVAL * 3);

      expect(onLost.calledOnce).to.equal(true);
      expect(onLost.firstCall.args[0]).to.be.instanceOf(KeepaliveLostError);
      expect(task.running).to.equal(false);
      expect(transport.keepalives).to.equal(0);
    });

    it('should treat a failing keepalive as loss', async () => {
      const onLost = sinon.spy();
      const task = new KeepaliveTask(transport, { intervalMs: INTERVAL, onLost });
      transport.keepaliveError = new Error('socket hang up');
      task.start();

      await clock.tickAsync(INTERVAL);
      await flush();

      expect(onLost.calledOnce).to.equal(true);
      expect(onLost.firstCall.args[0])
        .to.be.instanceOf(KeepaliveLostError)
        .and.have.property('message', 'Keepalive check failed');
    });

    it('should never fire after stop', async () => {
      const onLost = sinon.spy();
      const task = new KeepaliveTask(transport, { intervalMs: INTERVAL, onLost });
      task.start();
      task.stop();
      transport.active = false;

      await clock.tickAsync(INTERVAL * 2);

      expect(onLost.called).to.equal(false);
      expect(transport.keepalives).to.equal(0);
    });
  });

  describe('RemoteSession keepalive', () => {
    let session: RemoteSession;
    let logger: MemoryLogger;

    beforeEach(() => {
      logger = new MemoryLogger();
      session = new RemoteSession(testConfig(), { transport, logger });
    });

    afterEach(async () => {
      await session.disconnect();
    });

    it('should keep a healthy session connected', async () => {
      await session.connect();

      await clock.tickAsync(INTERVAL);
      await flush();

      expect(session.connected).to.equal(true);
      expect(transport.keepalives).to.equal(1);
    });

    it('should mark the session disconnected within one interval of losing the transport', async () => {
      await session.connect();
      transport.active = false;

      await clock.tickAsync(INTERVAL);

      expect(session.connected).to.equal(false);
      expect(logger.lines).to.include(
        'warn: Connection lost: Transport is no longer active'
      );
      expect(await captureError(session.execute('ls'))).to.be.instanceOf(
        NotConnectedError
      );
    });

    it('should stop the keepalive on disconnect', async () => {
      await session.connect();
      await session.disconnect();

      await clock.tickAsync(INTERVAL * 2);

      expect(transport.keepalives).to.equal(0);
    });

    it('should not let a previous connection\'s keepalive touch a reconnected session', async () => {
      await session.connect();
      await session.disconnect();
      await session.connect();

      await clock.tickAsync(INTERVAL);
      await flush();

      expect(session.connected).to.equal(true);
      expect(transport.keepalives).to.equal(1);
    });
  });
});
