import { LaserController } from '../src/controller/LaserController';
import { MockLink } from '../src/connections/MockLink';
import { ConfigOverrides } from '../src/config/config';
import { STATUS_BUSY, STATUS_READY } from '../src/codec/opcodes';
import { ConnectionState, TransportKind } from '../src/types';
import { delay, recordStates, waitFor, waitForState } from './helpers/async-helpers';

const baseConfig: ConfigOverrides = {
  transportKind: TransportKind.Mock,
  retryLimit: 3,
  backoffPolicy: { initialDelayMs: 1, multiplier: 1, maxDelayMs: 1 },
  autoReconnect: false,
  receiveTimeoutMs: 200,
};

describe('ConnectionSupervisor', () => {
  let link: MockLink;
  let controller: LaserController;

  const createController = (overrides: ConfigOverrides = {}): LaserController => {
    controller = new LaserController({ ...baseConfig, ...overrides }, { link });
    return controller;
  };

  beforeEach(() => {
    link = new MockLink();
  });

  afterEach(async () => {
    await controller.shutdown();
  });

  describe('connect', () => {
    test('should open the link and handshake before reporting connected', async () => {
      createController();
      const states = recordStates(controller);

      await controller.connect();

      expect(states).toEqual([
        ConnectionState.Disconnected,
        ConnectionState.Connecting,
        ConnectionState.Connected,
      ]);
      expect(link.sentCommands()).toEqual([{ kind: 'getVersion' }]);
      expect(controller.statistics().receivedCount).toBe(1);
    });

    test('should skip the handshake when disabled', async () => {
      createController({ handshake: false });

      await controller.connect();

      expect(controller.connectionState()).toBe(ConnectionState.Connected);
      expect(link.sent).toHaveLength(0);
    });

    test('should fail with HandshakeFailed when the device stays silent', async () => {
      createController({ receiveTimeoutMs: 50 });
      link.setSilent(true);

      await expect(controller.connect()).rejects.toMatchObject({ reason: 'HandshakeFailed' });
      expect(controller.connectionState()).toBe(ConnectionState.Failed);
      expect(link.isAlive()).toBe(false);
    });

    test('should reject connect after shutdown', async () => {
      createController();
      await controller.shutdown();

      await expect(controller.connect()).rejects.toThrow('Controller is not initialized');
    });
  });

  describe('sending', () => {
    test('should deliver queued packets in FIFO order', async () => {
      createController();
      await controller.connect();

      for (let i = 1; i <= 5; i++) {
        expect(controller.send({ kind: 'cut', x: i, y: i }).accepted).toBe(true);
      }
      await waitFor(() => controller.statistics().sentCount === 5);

      expect(link.sentCommands().slice(1)).toEqual(
        [1, 2, 3, 4, 5].map((i) => ({ kind: 'cut', x: i, y: i }))
      );
      expect(controller.statistics()).toMatchObject({
        lastPacketText: 'listMarkTo x=5 y=5',
        peakBufferBytes: 60,
        currentBufferBytes: 0,
      });
      expect(controller.queueLength()).toBe(0);
    });

    test('should publish the text of each delivered packet', async () => {
      createController();
      const texts: string[] = [];
      controller.subscribe('packetText', (text) => {
        texts.push(text);
      });
      await controller.connect();

      controller.send({ kind: 'setPower', percent: 50 });
      controller.send({ kind: 'laserOn' });
      await waitFor(() => texts.length === 2);

      expect(texts).toEqual(['listMarkCurrent percent=50', 'EnableLaser']);
    });

    test('should keep packets queued across a disconnect', async () => {
      createController();
      await controller.connect();
      await controller.disconnect();

      controller.send({ kind: 'move', x: 7, y: 7 });
      expect(controller.queueLength()).toBe(1);

      await controller.connect();
      await waitFor(() => controller.statistics().sentCount === 1);

      expect(link.sentCommands()).toEqual([
        { kind: 'getVersion' },
        { kind: 'getVersion' },
        { kind: 'move', x: 7, y: 7 },
      ]);
    });

    test('should reset statistics without touching the session', async () => {
      createController();
      await controller.connect();
      controller.send({ kind: 'cut', x: 1, y: 1 });
      await waitFor(() => controller.statistics().sentCount === 1);

      controller.resetStatistics();

      expect(controller.connectionState()).toBe(ConnectionState.Connected);
      expect(controller.statistics()).toMatchObject({
        sentCount: 0,
        receivedCount: 0,
        lastPacketText: 'listMarkTo x=1 y=1',
      });

      controller.send({ kind: 'cut', x: 2, y: 2 });
      await waitFor(() => controller.statistics().sentCount === 1);
      expect(controller.statistics().lastPacketText).toBe('listMarkTo x=2 y=2');
    });
  });

  describe('flow control', () => {
    test('should hold queued packets while paused but let priority packets through', async () => {
      createController();
      await controller.connect();

      controller.pause();
      controller.send({ kind: 'cut', x: 1, y: 1 });
      await delay(20);

      expect(link.sentCommands()).toEqual([{ kind: 'getVersion' }]);
      expect(controller.queueLength()).toBe(1);

      controller.send({ kind: 'goto', x: 10, y: 10 }, { priority: true });
      await waitFor(() => controller.statistics().sentCount === 1);
      expect(controller.isPaused()).toBe(true);

      controller.resume();
      await waitFor(() => controller.statistics().sentCount === 2);

      expect(link.sentCommands()).toEqual([
        { kind: 'getVersion' },
        { kind: 'goto', x: 10, y: 10 },
        { kind: 'cut', x: 1, y: 1 },
      ]);
    });

    test('should drop queued packets and send stop frames on abort', async () => {
      createController();
      await controller.connect();
      controller.pause();
      [1, 2, 3].forEach((n) => controller.send({ kind: 'cut', x: n, y: n }));

      const results = controller.abort();
      await waitFor(() => controller.statistics().sentCount === 2);

      expect(results.map((r) => r.accepted)).toEqual([true, true]);
      expect(link.sentCommands()).toEqual([{ kind: 'getVersion' }, { kind: 'stop' }, { kind: 'laserOff' }]);
      expect(controller.queueLength()).toBe(0);
      expect(controller.statistics().currentBufferBytes).toBe(0);
    });

    test('should poll the list status before sending while the device is busy', async () => {
      createController({ busyPollIntervalMs: 5 });
      link.statusFlags = STATUS_READY | STATUS_BUSY;
      await controller.connect();

      controller.send({ kind: 'cut', x: 4, y: 4 });
      await delay(30);

      const kinds = link.sentCommands().map((c) => c.kind);
      expect(kinds).not.toContain('cut');
      expect(kinds.filter((k) => k === 'getListStatus').length).toBeGreaterThan(0);

      link.statusFlags = STATUS_READY;
      await waitFor(() => controller.statistics().sentCount === 1);

      expect(link.sentCommands().slice(-1)).toEqual([{ kind: 'cut', x: 4, y: 4 }]);
    });
  });

  describe('retries', () => {
    test('should re-send a failed packet before the next one', async () => {
      createController();
      await controller.connect();
      const states = recordStates(controller);
      link.failNextSends(1);

      [1, 2, 3].forEach((n) => controller.send({ kind: 'cut', x: n, y: n }));
      await waitFor(() => controller.statistics().sentCount === 3);

      expect(link.sentCommands().slice(1)).toEqual([
        { kind: 'cut', x: 1, y: 1 },
        { kind: 'cut', x: 2, y: 2 },
        { kind: 'cut', x: 3, y: 3 },
      ]);
      expect(states).toEqual([
        ConnectionState.Connected,
        ConnectionState.Retrying,
        ConnectionState.Connected,
      ]);
      expect(controller.statistics().retryCount).toBe(1);
    });

    test('should give up after retryLimit attempts and keep the packet', async () => {
      createController();
      await controller.connect();
      const attempts: Array<number | undefined> = [];
      controller.subscribe('connectionState', (event) => {
        if (event.state === ConnectionState.Retrying) attempts.push(event.attempt);
      });
      const states = recordStates(controller);
      link.failAllSends(true);

      controller.send({ kind: 'cut', x: 1, y: 1 });
      await waitForState(controller, ConnectionState.Failed);

      expect(states).toEqual([
        ConnectionState.Connected,
        ConnectionState.Retrying,
        ConnectionState.Retrying,
        ConnectionState.Retrying,
        ConnectionState.Failed,
      ]);
      expect(attempts).toEqual([1, 2, 3]);
      expect(controller.statistics()).toMatchObject({
        retryCount: 3,
        connectionErrorCount: 1,
        sentCount: 0,
      });
      expect(controller.queueLength()).toBe(1);
    });

    test('should reopen a link lost while idle', async () => {
      createController();
      const errors: Error[] = [];
      controller.subscribe('error', (error) => {
        errors.push(error);
      });
      await controller.connect();
      const states = recordStates(controller);

      link.drop('Device unplugged');
      await waitFor(() => link.openCount === 2 && controller.connectionState() === ConnectionState.Connected);

      expect(states).toEqual([
        ConnectionState.Connected,
        ConnectionState.Retrying,
        ConnectionState.Connected,
      ]);
      expect(errors.map((e) => e.message)).toEqual(['mock device lost: Device unplugged']);
      expect(link.isAlive()).toBe(true);
      expect(controller.statistics().retryCount).toBe(1);

      controller.send({ kind: 'laserOff' });
      await waitFor(() => controller.statistics().sentCount === 1);
    });

    test('should fail when a lost link cannot be reopened', async () => {
      createController({ retryLimit: 2 });
      await controller.connect();
      link.failOpens('NotFound', 2);

      link.drop('Device unplugged');
      await waitForState(controller, ConnectionState.Failed);

      expect(controller.statistics()).toMatchObject({ retryCount: 2, connectionErrorCount: 1 });
      expect(controller.failureCount()).toBe(1);
    });
  });

  describe('suspension', () => {
    test('should suspend after repeated open failures until connect is called', async () => {
      createController({ autoReconnect: true, suspendThreshold: 2 });
      const states = recordStates(controller);
      link.failOpens('Busy', 2);

      await expect(controller.connect()).rejects.toMatchObject({ reason: 'Busy' });
      await waitForState(controller, ConnectionState.Suspended);

      expect(states).toEqual([
        ConnectionState.Disconnected,
        ConnectionState.Connecting,
        ConnectionState.Failed,
        ConnectionState.Connecting,
        ConnectionState.Failed,
        ConnectionState.Suspended,
      ]);
      expect(controller.failureCount()).toBe(2);
      expect(controller.statistics().connectionErrorCount).toBe(2);

      await controller.connect();

      expect(controller.connectionState()).toBe(ConnectionState.Connected);
      expect(controller.failureCount()).toBe(0);
    });

    test('should count failures across reconnects when the link opens but never delivers', async () => {
      createController({ handshake: false, retryLimit: 1, autoReconnect: true, suspendThreshold: 2 });
      await controller.connect();
      const states = recordStates(controller);
      link.failAllSends(true);

      controller.send({ kind: 'cut', x: 1, y: 1 });
      await waitForState(controller, ConnectionState.Suspended);

      expect(states).toEqual([
        ConnectionState.Connected,
        ConnectionState.Retrying,
        ConnectionState.Failed,
        ConnectionState.Connecting,
        ConnectionState.Connected,
        ConnectionState.Retrying,
        ConnectionState.Failed,
        ConnectionState.Suspended,
      ]);
      expect(controller.failureCount()).toBe(2);
      expect(link.openCount).toBe(4);
      expect(controller.queueLength()).toBe(1);
    });
  });

  describe('disconnect', () => {
    test('should pass through disconnecting', async () => {
      createController();
      await controller.connect();
      const states = recordStates(controller);

      await Promise.all([controller.disconnect(), controller.disconnect()]);

      expect(states).toEqual([
        ConnectionState.Connected,
        ConnectionState.Disconnecting,
        ConnectionState.Disconnected,
      ]);
      expect(link.closeCount).toBeGreaterThanOrEqual(1);
      expect(link.isAlive()).toBe(false);
    });

    test('should let an in-flight send finish before disconnected', async () => {
      createController();
      await controller.connect();
      const states = recordStates(controller);
      link.setSendDelay(50);

      controller.send({ kind: 'cut', x: 9, y: 9 });
      await delay(10);
      await controller.disconnect();

      expect(states).toEqual([
        ConnectionState.Connected,
        ConnectionState.Disconnecting,
        ConnectionState.Disconnected,
      ]);
      expect(link.sentCommands()).toEqual([{ kind: 'getVersion' }, { kind: 'cut', x: 9, y: 9 }]);
      expect(controller.statistics()).toMatchObject({ sentCount: 1, currentBufferBytes: 0 });
      expect(controller.queueLength()).toBe(0);

      await controller.connect();
      await delay(20);

      expect(link.sentCommands().filter((c) => c.kind === 'cut')).toHaveLength(1);
    });

    test('should not wait out the backoff when disconnecting while retrying', async () => {
      createController({ backoffPolicy: { initialDelayMs: 3000, multiplier: 1, maxDelayMs: 3000 } });
      await controller.connect();
      link.setCloseDelay(30);
      link.failAllSends(true);

      controller.send({ kind: 'cut', x: 1, y: 1 });
      await waitForState(controller, ConnectionState.Retrying);
      const started = Date.now();
      await controller.disconnect();

      expect(Date.now() - started).toBeLessThan(1000);
      expect(controller.connectionState()).toBe(ConnectionState.Disconnected);
      expect(controller.queueLength()).toBe(1);
    });

    test('should clear the queue and return to uninitialized on shutdown', async () => {
      createController();
      controller.send({ kind: 'home' });

      await controller.shutdown();

      expect(controller.connectionState()).toBe(ConnectionState.Uninitialized);
      expect(controller.queueLength()).toBe(0);

      controller.initialize();
      expect(controller.connectionState()).toBe(ConnectionState.Disconnected);
    });
  });
});
