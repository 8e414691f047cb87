// src/types/metrics.ts

export interface CpuStats {
  usage: number; // percent
  temp: number | null; // °C, null when the host exposes no sensor
  freq: number; // MHz
}

/** Memory or disk usage; sizes in GB. */
export interface UsageStats {
  total: number;
  used: number;
  free: number;
  percent: number;
}

export interface PlatformInfo {
  distro: string;
  kernel: string;
  /** e.g. "2 days, 3 hrs, 4 mins, 5 secs"; "N/A" when unreadable. */
  uptime: string;
}

/** Processes aggregated by name. */
export interface ProcessEntry {
  pid: number;
  name: string;
  username: string;
  mem: number; // MB
}

export interface InterfaceStatistics {
  mb_sent: number;
  mb_received: number;
  error_in: number;
  error_out: number;
  dropout: number;
}

export interface InterfaceAverage {
  interface: string;
  in: number; // MB/s
  out: number; // MB/s
}

export interface WirelessInfo {
  name: string;
  quality: string;
  channel: string;
  encryption: string;
  address: string;
  signal: string;
}

/**
 * Stands in for a domain whose provider failed; the rest of the snapshot
 * is still served.
 */
export interface ProviderFailureMarker {
  error: 'PROVIDER_FAILURE';
  message: string;
}

export type Reading<T> = T | ProviderFailureMarker;

export interface SystemSnapshot {
  cpu: Reading<CpuStats>;
  disk: Reading<UsageStats>;
  mem: Reading<UsageStats>;
  user: Reading<string>;
  platform: Reading<PlatformInfo>;
  processes: Reading<ProcessEntry[]>;
}

export interface NetworkSnapshot {
  interfaces: Reading<string[]>;
  wireless: Reading<WirelessInfo>;
  statistics: Reading<Record<string, InterfaceStatistics>>;
  averages?: Reading<Record<string, InterfaceAverage>>;
}

export interface SystemProviders {
  cpu(): Promise<CpuStats>;
  mem(): Promise<UsageStats>;
  disk(): Promise<UsageStats>;
  user(): Promise<string>;
  platform(): Promise<PlatformInfo>;
  processes(): Promise<ProcessEntry[]>;
}

export interface NetworkProviders {
  interfaces(): Promise<string[]>;
  statistics(): Promise<Record<string, InterfaceStatistics>>;
  wireless(): Promise<WirelessInfo>;
  averages(): Promise<Record<string, InterfaceAverage>>;
}
