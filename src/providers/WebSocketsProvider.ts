// src/providers/WebSocketsProvider.ts
import { createCorsOptions, isOriginAllowed } from 'App/middlewares/corsPolicy';
import {
  BadRequestError,
  CustomError,
  ServerAtCapacityError,
} from 'App/errors/CustomError';
import { SessionRegistry } from 'App/services/SessionRegistry';
import { SnapshotChannel, SnapshotService } from 'App/services/SnapshotService';
import { StreamPublisher } from 'App/services/StreamPublisher';
import {
  ClientToServerEvents,
  InterServerEvents,
  MonitorSocket,
  ServerToClientEvents,
  SocketData,
} from 'App/types/socket';
import type { Server as HttpServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';

export type MonitorIoServer = SocketIOServer<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export interface WebSocketsOptions {
  registry: SessionRegistry<MonitorSocket>;
  snapshots: SnapshotService;
  publishIntervalMs: number;
  maxStalledTicks: number;
  maxConnections: number;
  /** Same allowlist as the HTTP routes; empty allows any origin. */
  corsOrigins: readonly string[];
}

export interface WebSocketsHandle {
  io: MonitorIoServer;
  /** Number of streams currently publishing. */
  activeStreams(): number;
}

/** Path the streaming endpoint is served on. */
export const STREAM_PATH = '/connect';

const CHANNELS: readonly SnapshotChannel[] = ['system', 'network'];

const isChannel = (value: string): value is SnapshotChannel =>
  CHANNELS.some(channel => channel === value);

/** Rejection passed to a handshake `next()`; the client sees message and data.code. */
class HandshakeError extends Error {
  public readonly data: { code: string };

  constructor(message: string, code: string) {
    super(message);
    this.data = { code };
  }
}

const queryParam = (socket: MonitorSocket, key: string): string | undefined => {
  const value: unknown = socket.handshake.query[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * Attaches the streaming endpoint to the HTTP server.
 *
 * Handshake: `GET /connect?id=<worker id>&subscriber=<subject>[&channel=system|network]`.
 * The handshake claims the worker; any failure (capacity, missing params,
 * unknown/expired/claimed worker, wrong subscriber) rejects the upgrade and the
 * transport is closed. A claimed stream is handed to a StreamPublisher whose
 * stop() releases the worker when the socket disconnects; a transport that
 * closes before that hand-off releases it itself.
 */
export const initWebSockets = (
  server: HttpServer,
  options: WebSocketsOptions,
): WebSocketsHandle => {
  const { registry, snapshots } = options;
  const publishers = new Map<string, StreamPublisher>();

  const io: MonitorIoServer = new SocketIOServer<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(server, {
    path: STREAM_PATH,
    // cors covers polling; the upgrade request only passes allowRequest
    cors: createCorsOptions(options.corsOrigins),
    allowRequest: (req, callback) => {
      const allowed = isOriginAllowed(options.corsOrigins, req.headers.origin);
      if (!allowed) {
        console.warn(`[WS] Rejected origin ${req.headers.origin ?? ''}`);
      }
      callback(null, allowed);
    },
  });

  io.use((socket, next) => {
    try {
      if (publishers.size >= options.maxConnections) {
        throw new ServerAtCapacityError();
      }

      const workerId = queryParam(socket, 'id');
      const subscriber = queryParam(socket, 'subscriber');
      if (!workerId || !subscriber) {
        throw new BadRequestError('id and subscriber are required');
      }
      const channel = queryParam(socket, 'channel') ?? 'system';
      if (!isChannel(channel)) {
        throw new BadRequestError(
          `channel must be one of: ${CHANNELS.join(', ')}`,
        );
      }

      registry.claim(workerId, subscriber, socket);
      socket.data = { workerId, subscriber, channel };
      // a transport that dies before the connect step never emits 'disconnect'
      socket.conn.once('close', () => {
        if (registry.get(workerId)?.connection === socket) {
          registry.release(workerId);
          console.warn(
            `[WS] Stream ${socket.id} closed before connecting; worker released`,
          );
        }
      });
      next();
    } catch (err) {
      if (err instanceof CustomError) {
        console.warn(`[WS] Rejected stream ${socket.id}: ${err.code}`);
        next(new HandshakeError(err.message, err.code));
        return;
      }
      console.error('[WS] Handshake error:', err);
      next(new HandshakeError('Internal server error', 'INTERNAL_SERVER_ERROR'));
    }
  });

  io.on('connection', socket => {
    const { workerId, channel } = socket.data;
    console.log(
      `[WS] Stream ${socket.id} claimed worker, publishing ${channel} data`,
    );

    const publisher = new StreamPublisher({
      socket,
      workerId,
      channel,
      registry,
      snapshots,
      intervalMs: options.publishIntervalMs,
      maxStalledTicks: options.maxStalledTicks,
      onStop: () => publishers.delete(socket.id),
    });
    publishers.set(socket.id, publisher);

    socket.on('disconnect', reason => {
      publisher.stop(`client disconnected (${reason})`);
    });

    socket.emit('status', {
      message: 'connected to monitor, transmitting data...',
    });
    publisher.start();
  });

  return {
    io,
    activeStreams: () => publishers.size,
  };
};
