// src/types/socket.ts
import type { SnapshotChannel } from 'App/services/SnapshotService';
import type { NetworkSnapshot, SystemSnapshot } from 'App/types/metrics';
import type { Socket } from 'socket.io';

export interface ServerToClientEvents {
  status: (payload: { message: string }) => void;
  system: (snapshot: SystemSnapshot) => void;
  network: (snapshot: NetworkSnapshot) => void;
}

/** Streams are write-only from the server's side. */
export type ClientToServerEvents = Record<string, never>;

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  workerId: string;
  subscriber: string;
  channel: SnapshotChannel;
}

export type MonitorSocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;
