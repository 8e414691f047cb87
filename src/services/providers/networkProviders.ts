// src/services/providers/networkProviders.ts
import {
  InterfaceAverage,
  InterfaceStatistics,
  NetworkProviders,
  WirelessInfo,
} from 'App/types/metrics';
import { bytesToMb, round } from 'App/utils/format';
import * as si from 'systeminformation';

const EMPTY_WIRELESS: WirelessInfo = {
  name: '',
  quality: '',
  channel: '',
  encryption: '',
  address: '',
  signal: '',
};

async function interfaces(): Promise<string[]> {
  const data = await si.networkInterfaces();
  const list = Array.isArray(data) ? data : [data];
  return list.map(nic => nic.iface);
}

async function statistics(): Promise<Record<string, InterfaceStatistics>> {
  const stats = await si.networkStats('*');
  const out: Record<string, InterfaceStatistics> = {};
  for (const s of stats) {
    out[s.iface] = {
      mb_sent: bytesToMb(s.tx_bytes, 3),
      mb_received: bytesToMb(s.rx_bytes, 3),
      error_in: s.rx_errors,
      error_out: s.tx_errors,
      dropout: s.rx_dropped + s.tx_dropped,
    };
  }
  return out;
}

/**
 * Per-interface throughput in MB/s. systeminformation derives the rate from
 * the previous call, so the first reading after start-up is 0.
 */
async function averages(): Promise<Record<string, InterfaceAverage>> {
  const stats = await si.networkStats('*');
  const out: Record<string, InterfaceAverage> = {};
  for (const s of stats) {
    out[s.iface] = {
      interface: s.iface,
      in: round((s.rx_sec ?? 0) / 1024 / 1024, 3),
      out: round((s.tx_sec ?? 0) / 1024 / 1024, 3),
    };
  }
  return out;
}

async function wireless(): Promise<WirelessInfo> {
  const connections = await si.wifiConnections();
  const current = connections[0];
  if (!current) return { ...EMPTY_WIRELESS };
  const security: unknown = current.security;
  return {
    name: String(current.ssid ?? ''),
    quality: String(current.quality ?? ''),
    channel: String(current.channel ?? ''),
    encryption: Array.isArray(security)
      ? security.join(', ')
      : String(security ?? ''),
    address: String(current.bssid ?? ''),
    signal: String(current.signalLevel ?? ''),
  };
}

/** Network readers backed by systeminformation. */
export const networkProviders: NetworkProviders = {
  interfaces,
  statistics,
  wireless,
  averages,
};
