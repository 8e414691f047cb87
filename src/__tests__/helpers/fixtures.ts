// Shared fakes: no test touches the host's real sensors or the user's state dir.
import type { AppConfig } from 'App/config/config';
import type { NetworkProviders, SystemProviders } from 'App/types/metrics';

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  port: 0,
  host: '127.0.0.1',
  mode: 'test',
  jwtSecret: 'test-secret',
  accessTokenTtlSec: 60,
  workerGraceMs: 5000,
  workerSweepMs: 1000,
  publishIntervalMs: 50,
  maxStalledTicks: 3,
  poolSize: 4,
  poolMaxQueue: 64,
  maxWsConnections: 20,
  corsOrigins: [],
  authRateLimit: 10,
  rateLimit: 3000,
  accountFile: '',
  credentialsFile: '',
  username: 'monitor',
  password: 'test-password',
  bcryptRounds: 4,
  ...overrides,
});

export const fakeSystemProviders = (
  overrides: Partial<SystemProviders> = {},
): SystemProviders => ({
  cpu: async () => ({ usage: 12.5, temp: 48, freq: 2400 }),
  mem: async () => ({ total: 16, used: 6.4, free: 9.6, percent: 40 }),
  disk: async () => ({ total: 512, used: 128, free: 384, percent: 25 }),
  user: async () => 'tester',
  platform: async () => ({
    distro: 'TestOS 1.0',
    kernel: '6.1.0-test',
    uptime: '1 hr, 2 mins',
  }),
  processes: async () => [
    { pid: 42, name: 'node', username: 'tester', mem: 128.5 },
  ],
  ...overrides,
});

export const fakeNetworkProviders = (
  overrides: Partial<NetworkProviders> = {},
): NetworkProviders => ({
  interfaces: async () => ['lo', 'eth0'],
  statistics: async () => ({
    eth0: { mb_sent: 1.5, mb_received: 3, error_in: 0, error_out: 0, dropout: 2 },
  }),
  wireless: async () => ({
    name: '',
    quality: '',
    channel: '',
    encryption: '',
    address: '',
    signal: '',
  }),
  averages: async () => ({
    eth0: { interface: 'eth0', in: 0.25, out: 0.125 },
  }),
  ...overrides,
});

/** Controllable clock for registry and token expiry. */
export const manualClock = (start: number = 1_700_000_000_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

export const fakeConnection = () => {
  const calls: Array<boolean | undefined> = [];
  return {
    calls,
    disconnect: (close?: boolean) => {
      calls.push(close);
    },
  };
};
