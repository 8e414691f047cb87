// src/services/SnapshotService.ts
import {
  NetworkProviders,
  NetworkSnapshot,
  ProviderFailureMarker,
  Reading,
  SystemProviders,
  SystemSnapshot,
} from 'App/types/metrics';
import { OffloadPool } from './OffloadPool';

export type SnapshotChannel = 'system' | 'network';

/** A snapshot tagged with the channel (and socket event) it belongs to. */
export type ChannelSnapshot =
  | { channel: 'system'; snapshot: SystemSnapshot }
  | { channel: 'network'; snapshot: NetworkSnapshot };

export interface NetworkSnapshotOptions {
  averages?: boolean;
}

export const isProviderFailure = (
  value: unknown,
): value is ProviderFailureMarker =>
  typeof value === 'object' &&
  value !== null &&
  'error' in value &&
  value.error === 'PROVIDER_FAILURE';

/**
 * Assembles system and network snapshots from the providers, running every
 * provider call through the offload pool.
 *
 * A provider that fails (or a pool that refuses the call) only degrades its
 * own field to a ProviderFailureMarker; the snapshot itself always resolves.
 */
export class SnapshotService {
  constructor(
    private readonly pool: OffloadPool,
    private readonly system: SystemProviders,
    private readonly network: NetworkProviders,
  ) {}

  async getSystemSnapshot(): Promise<SystemSnapshot> {
    const [cpu, mem, disk, user, platform, processes] = await Promise.all([
      this.read('cpu', () => this.system.cpu()),
      this.read('mem', () => this.system.mem()),
      this.read('disk', () => this.system.disk()),
      this.read('user', () => this.system.user()),
      this.read('platform', () => this.system.platform()),
      this.read('processes', () => this.system.processes()),
    ]);
    return { cpu, disk, mem, user, platform, processes };
  }

  async getNetworkSnapshot(
    options: NetworkSnapshotOptions = {},
  ): Promise<NetworkSnapshot> {
    const [interfaces, wireless, statistics, averages] = await Promise.all([
      this.read('interfaces', () => this.network.interfaces()),
      this.read('wireless', () => this.network.wireless()),
      this.read('statistics', () => this.network.statistics()),
      options.averages
        ? this.read('averages', () => this.network.averages())
        : undefined,
    ]);
    const snapshot: NetworkSnapshot = { interfaces, wireless, statistics };
    if (averages !== undefined) snapshot.averages = averages;
    return snapshot;
  }

  /** Snapshot for a streaming channel. */
  async getSnapshot(channel: SnapshotChannel): Promise<ChannelSnapshot> {
    if (channel === 'network') {
      return { channel, snapshot: await this.getNetworkSnapshot() };
    }
    return { channel, snapshot: await this.getSystemSnapshot() };
  }

  private async read<T>(
    label: string,
    fn: () => Promise<T>,
  ): Promise<Reading<T>> {
    try {
      return await this.pool.run(label, fn);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[Snapshot] ${label} unavailable: ${message}`);
      return { error: 'PROVIDER_FAILURE', message };
    }
  }
}
