import { jest } from '@jest/globals';
import { OffloadPool } from 'App/services/OffloadPool';
import { SessionRegistry } from 'App/services/SessionRegistry';
import { SnapshotChannel, SnapshotService } from 'App/services/SnapshotService';
import { StreamPublisher } from 'App/services/StreamPublisher';
import { MonitorSocket } from 'App/types/socket';
import { fakeNetworkProviders, fakeSystemProviders } from './helpers/fixtures';
import { sleep, waitFor } from './helpers/waitFor';

/** Just the socket surface the publisher touches. */
const createFakeSocket = () => {
  const emit = jest.fn<(event: string, payload: unknown) => boolean>(() => true);
  const fake = {
    id: 'sock-1',
    connected: true,
    conn: { transport: { writable: true } },
    volatile: { emit },
    disconnect: jest.fn<(close?: boolean) => void>(),
  };
  fake.disconnect.mockImplementation(() => {
    fake.connected = false;
  });
  return { fake, emit, socket: fake as unknown as MonitorSocket };
};

describe('StreamPublisher', () => {
  let pool: OffloadPool;
  let snapshots: SnapshotService;
  let registry: SessionRegistry<MonitorSocket>;
  let publisher: StreamPublisher | undefined;

  const setup = (
    channel: SnapshotChannel = 'system',
    maxStalledTicks = 3,
  ) => {
    const socket = createFakeSocket();
    const workerId = registry.create('alice');
    registry.claim(workerId, 'alice', socket.socket);
    const onStop = jest.fn<(reason: string) => void>();
    publisher = new StreamPublisher({
      socket: socket.socket,
      workerId,
      channel,
      registry,
      snapshots,
      intervalMs: 10,
      maxStalledTicks,
      onStop,
    });
    return { ...socket, workerId, onStop, publisher };
  };

  beforeEach(() => {
    pool = new OffloadPool({ size: 2 });
    snapshots = new SnapshotService(
      pool,
      fakeSystemProviders(),
      fakeNetworkProviders(),
    );
    registry = new SessionRegistry<MonitorSocket>();
  });

  afterEach(async () => {
    publisher?.stop('test teardown');
    publisher = undefined;
    await pool.close();
  });

  it('pushes system snapshots until stopped, then releases the worker once', async () => {
    const { emit, workerId, onStop, publisher } = setup('system');

    publisher.start();
    expect(publisher.running).toBe(true);
    await waitFor(() => emit.mock.calls.length >= 3);

    const [event, payload] = emit.mock.calls[0];
    expect(event).toBe('system');
    expect(payload).toMatchObject({
      cpu: { usage: 12.5, temp: 48, freq: 2400 },
      user: 'tester',
    });

    publisher.stop('client disconnected (transport close)');
    publisher.stop('again');

    expect(publisher.running).toBe(false);
    expect(registry.get(workerId)).toBeUndefined();
    expect(onStop).toHaveBeenCalledTimes(1);
    expect(onStop).toHaveBeenCalledWith('client disconnected (transport close)');

    const pushed = emit.mock.calls.length;
    await sleep(50);
    expect(emit.mock.calls.length).toBe(pushed);
    expect(publisher.publishedCount).toBe(pushed);
  });

  it('pushes network snapshots on the network channel', async () => {
    const { emit, publisher } = setup('network');

    publisher.start();
    await waitFor(() => emit.mock.calls.length >= 1);

    expect(emit.mock.calls[0][0]).toBe('network');
    expect(emit.mock.calls[0][1]).toMatchObject({ interfaces: ['lo', 'eth0'] });
  });

  it('stops on its own once the peer is gone', async () => {
    const { fake, workerId, onStop, publisher } = setup();

    publisher.start();
    fake.connected = false;
    await waitFor(() => onStop.mock.calls.length === 1);

    expect(onStop).toHaveBeenCalledWith('peer disconnected');
    expect(registry.get(workerId)).toBeUndefined();
  });

  it('drops a consumer whose transport stays unwritable', async () => {
    const { fake, emit, workerId, onStop, publisher } = setup('system', 3);
    fake.conn.transport.writable = false;

    publisher.start();
    await waitFor(() => onStop.mock.calls.length === 1);

    expect(onStop).toHaveBeenCalledWith('slow consumer (3 stalled ticks)');
    expect(fake.disconnect).toHaveBeenCalledWith(true);
    expect(emit).not.toHaveBeenCalled();
    expect(registry.get(workerId)).toBeUndefined();
  });

  it('resumes publishing when the transport drains in time', async () => {
    const { fake, emit, onStop, publisher } = setup('system', 50);
    fake.conn.transport.writable = false;

    publisher.start();
    await sleep(25);
    fake.conn.transport.writable = true;
    await waitFor(() => emit.mock.calls.length >= 2);

    expect(onStop).not.toHaveBeenCalled();
    expect(fake.disconnect).not.toHaveBeenCalled();
  });

  it('disconnects the stream when a tick fails', async () => {
    const { fake, emit, workerId, onStop, publisher } = setup();
    emit.mockImplementation(() => {
      throw new Error('encoder failure');
    });

    publisher.start();
    await waitFor(() => onStop.mock.calls.length === 1);

    expect(onStop).toHaveBeenCalledWith('tick error');
    expect(fake.disconnect).toHaveBeenCalledWith(true);
    expect(fake.connected).toBe(false);
    expect(registry.get(workerId)).toBeUndefined();
  });

  it('tolerates a worker already dropped by shutdown', () => {
    const { onStop, publisher } = setup();

    publisher.start();
    registry.closeAll();

    expect(() => publisher.stop('server shutting down')).not.toThrow();
    expect(onStop).toHaveBeenCalledWith('server shutting down');
  });
});
