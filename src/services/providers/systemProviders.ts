// src/services/providers/systemProviders.ts
import {
  CpuStats,
  PlatformInfo,
  ProcessEntry,
  SystemProviders,
  UsageStats,
} from 'App/types/metrics';
import { bytesToGb, formatUptime, round } from 'App/utils/format';
import os from 'node:os';
import * as si from 'systeminformation';

/** Raw process row as far as aggregation cares. */
export interface RawProcess {
  pid: number;
  name: string;
  user: string;
  memRss: number; // kB
}

/**
 * Groups processes by name, summing resident memory (MB), keeping the first
 * pid seen and the distinct owners. Returns the `limit` heaviest entries.
 */
export function aggregateProcesses(
  list: RawProcess[],
  limit: number = 10,
): ProcessEntry[] {
  const byName = new Map<
    string,
    { mem: number; pids: number[]; users: Set<string> }
  >();
  for (const proc of list) {
    const name = proc.name || 'unknown';
    let entry = byName.get(name);
    if (!entry) {
      entry = { mem: 0, pids: [], users: new Set() };
      byName.set(name, entry);
    }
    entry.mem += (proc.memRss || 0) / 1024;
    entry.pids.push(proc.pid);
    if (proc.user) entry.users.add(proc.user);
  }

  return [...byName.entries()]
    .map(([name, entry]) => ({
      pid: entry.pids[0],
      name,
      username: [...entry.users].join(', '),
      mem: round(entry.mem, 2),
    }))
    .sort((a, b) => b.mem - a.mem)
    .slice(0, limit);
}

// distro and kernel do not change while the process runs
let osInfoCache: Promise<si.Systeminformation.OsData> | null = null;

const osInfo = (): Promise<si.Systeminformation.OsData> => {
  if (!osInfoCache) {
    osInfoCache = si.osInfo().catch(err => {
      osInfoCache = null;
      throw err;
    });
  }
  return osInfoCache;
};

let cachedUser: string | null = null;

async function cpu(): Promise<CpuStats> {
  const [load, temperature, speed] = await Promise.all([
    si.currentLoad(),
    si.cpuTemperature(),
    si.cpuCurrentSpeed(),
  ]);
  const temp: unknown = temperature.main;
  return {
    usage: round(load.currentLoad, 2),
    temp: typeof temp === 'number' && temp > 0 ? round(temp, 2) : null,
    freq: round(speed.avg * 1000, 2),
  };
}

async function mem(): Promise<UsageStats> {
  const m = await si.mem();
  return {
    total: bytesToGb(m.total),
    used: bytesToGb(m.active),
    free: bytesToGb(m.available),
    percent: m.total > 0 ? round((m.active / m.total) * 100, 1) : 0,
  };
}

async function disk(): Promise<UsageStats> {
  const filesystems = await si.fsSize();
  const root =
    filesystems.find(f => f.mount === '/') ??
    filesystems.find(f => /^[A-Z]:$/i.test(f.mount)) ??
    filesystems[0];
  if (!root) {
    throw new Error('no mounted filesystem reported');
  }
  return {
    total: bytesToGb(root.size),
    used: bytesToGb(root.used),
    free: bytesToGb(root.available),
    percent: round(root.use, 1),
  };
}

async function user(): Promise<string> {
  if (cachedUser === null) {
    cachedUser = os.userInfo().username;
  }
  return cachedUser;
}

async function platform(): Promise<PlatformInfo> {
  const info = await osInfo();
  return {
    distro: [info.distro, info.release].filter(Boolean).join(' '),
    kernel: info.kernel,
    uptime: formatUptime(si.time().uptime),
  };
}

async function processes(): Promise<ProcessEntry[]> {
  const data = await si.processes();
  return aggregateProcesses(data.list);
}

/** Host readers backed by systeminformation. */
export const systemProviders: SystemProviders = {
  cpu,
  mem,
  disk,
  user,
  platform,
  processes,
};
