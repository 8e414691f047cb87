// src/services/StreamPublisher.ts
import { WorkerNotFoundError } from 'App/errors/CustomError';
import { MonitorSocket } from 'App/types/socket';
import { SessionRegistry } from './SessionRegistry';
import { SnapshotChannel, SnapshotService } from './SnapshotService';

export interface StreamPublisherOptions {
  socket: MonitorSocket;
  workerId: string;
  channel: SnapshotChannel;
  registry: SessionRegistry<MonitorSocket>;
  snapshots: SnapshotService;
  intervalMs?: number;
  /** Consecutive ticks with an unwritable transport before the stream is dropped. */
  maxStalledTicks?: number;
  onStop?: (reason: string) => void;
}

/**
 * Pushes snapshots down one claimed stream until it ends.
 *
 * Ticks never overlap: the next one is scheduled only after the current
 * snapshot was gathered and emitted. Emissions are volatile, so a client that
 * cannot keep up loses intermediate snapshots and sees the latest one.
 * stop() releases the worker exactly once, whatever ended the stream.
 */
export class StreamPublisher {
  private readonly socket: MonitorSocket;
  private readonly workerId: string;
  private readonly channel: SnapshotChannel;
  private readonly registry: SessionRegistry<MonitorSocket>;
  private readonly snapshots: SnapshotService;
  private readonly intervalMs: number;
  private readonly maxStalledTicks: number;
  private readonly onStop?: (reason: string) => void;

  private timer: NodeJS.Timeout | null = null;
  private stopped = false;
  private stalledTicks = 0;
  private published = 0;

  constructor(options: StreamPublisherOptions) {
    this.socket = options.socket;
    this.workerId = options.workerId;
    this.channel = options.channel;
    this.registry = options.registry;
    this.snapshots = options.snapshots;
    this.intervalMs = options.intervalMs ?? 1000;
    this.maxStalledTicks = options.maxStalledTicks ?? 10;
    this.onStop = options.onStop;
  }

  get running(): boolean {
    return this.timer !== null && !this.stopped;
  }

  get publishedCount(): number {
    return this.published;
  }

  /** First snapshot goes out immediately. */
  start(): void {
    if (this.stopped || this.timer) return;
    this.schedule(0);
  }

  stop(reason: string): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    try {
      this.registry.release(this.workerId);
    } catch (err) {
      // already dropped, e.g. by registry.closeAll() during shutdown
      if (!(err instanceof WorkerNotFoundError)) throw err;
    }
    console.log(
      `[Stream] ${this.socket.id} (${this.channel}) stopped after ${this.published} push(es): ${reason}`,
    );
    this.onStop?.(reason);
  }

  private schedule(delayMs: number) {
    this.timer = setTimeout(() => {
      this.tick().catch(err => {
        console.error('[Stream] tick error:', err);
        this.stop('tick error');
        this.socket.disconnect(true);
      });
    }, delayMs);
  }

  private async tick() {
    if (this.stopped) return;

    if (!this.socket.connected) {
      this.stop('peer disconnected');
      return;
    }

    if (!this.socket.conn.transport.writable) {
      this.stalledTicks++;
      if (this.stalledTicks >= this.maxStalledTicks) {
        this.stop(`slow consumer (${this.stalledTicks} stalled ticks)`);
        this.socket.disconnect(true);
        return;
      }
    } else {
      this.stalledTicks = 0;
      await this.publish();
    }

    if (!this.stopped) this.schedule(this.intervalMs);
  }

  private async publish() {
    const next = await this.snapshots.getSnapshot(this.channel);
    if (this.stopped) return;
    if (next.channel === 'network') {
      this.socket.volatile.emit('network', next.snapshot);
    } else {
      this.socket.volatile.emit('system', next.snapshot);
    }
    this.published++;
  }
}
