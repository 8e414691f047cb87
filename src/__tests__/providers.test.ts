import { jest } from '@jest/globals';

const GiB = 1024 ** 3;
const MiB = 1024 ** 2;

// Fake host readings returned by the mocked systeminformation
const mockHost: Record<string, unknown> = {
  currentLoad: { currentLoad: 23.456 },
  cpuTemperature: { main: 55.5 },
  cpuCurrentSpeed: { avg: 2.4 },
  mem: { total: 16 * GiB, active: 4 * GiB, available: 12 * GiB },
  fsSize: [
    { mount: '/boot', size: GiB, used: GiB / 2, available: GiB / 2, use: 50 },
    { mount: '/', size: 100 * GiB, used: 40 * GiB, available: 60 * GiB, use: 40 },
  ],
  osInfo: { distro: 'Debian GNU/Linux', release: '12', kernel: '6.1.0-test' },
  time: { uptime: 3661 },
  processes: {
    list: [
      { pid: 7, name: 'postgres', user: 'postgres', memRss: 4096 },
      { pid: 8, name: 'postgres', user: 'postgres', memRss: 2048 },
    ],
  },
  networkInterfaces: [{ iface: 'lo' }, { iface: 'eth0' }],
  networkStats: [
    {
      iface: 'eth0',
      tx_bytes: 2 * MiB,
      rx_bytes: MiB,
      rx_errors: 1,
      tx_errors: 0,
      rx_dropped: 2,
      tx_dropped: 3,
      rx_sec: MiB / 2,
      tx_sec: MiB / 4,
    },
  ],
  wifiConnections: [],
};

jest.mock('systeminformation', () => {
  const read = (key: string) => async () => mockHost[key];
  return {
    currentLoad: read('currentLoad'),
    cpuTemperature: read('cpuTemperature'),
    cpuCurrentSpeed: read('cpuCurrentSpeed'),
    mem: read('mem'),
    fsSize: read('fsSize'),
    osInfo: read('osInfo'),
    time: () => mockHost.time,
    processes: read('processes'),
    networkInterfaces: read('networkInterfaces'),
    networkStats: read('networkStats'),
    wifiConnections: read('wifiConnections'),
  };
});

import { networkProviders } from 'App/services/providers/networkProviders';
import { systemProviders } from 'App/services/providers/systemProviders';

describe('system providers', () => {
  it('reads cpu load, temperature and frequency', async () => {
    await expect(systemProviders.cpu()).resolves.toEqual({
      usage: 23.46,
      temp: 55.5,
      freq: 2400,
    });
  });

  it('reports a missing temperature sensor as null', async () => {
    const saved = mockHost.cpuTemperature;
    mockHost.cpuTemperature = { main: null };
    try {
      await expect(systemProviders.cpu()).resolves.toMatchObject({ temp: null });
    } finally {
      mockHost.cpuTemperature = saved;
    }
  });

  it('reads memory in GB', async () => {
    await expect(systemProviders.mem()).resolves.toEqual({
      total: 16,
      used: 4,
      free: 12,
      percent: 25,
    });
  });

  it('reads the root filesystem', async () => {
    await expect(systemProviders.disk()).resolves.toEqual({
      total: 100,
      used: 40,
      free: 60,
      percent: 40,
    });
  });

  it('fails when no filesystem is mounted', async () => {
    const saved = mockHost.fsSize;
    mockHost.fsSize = [];
    try {
      await expect(systemProviders.disk()).rejects.toThrow(
        'no mounted filesystem reported',
      );
    } finally {
      mockHost.fsSize = saved;
    }
  });

  it('reads platform details with a formatted uptime', async () => {
    await expect(systemProviders.platform()).resolves.toEqual({
      distro: 'Debian GNU/Linux 12',
      kernel: '6.1.0-test',
      uptime: '1 hr, 1 min, 1 sec',
    });
  });

  it('aggregates processes', async () => {
    await expect(systemProviders.processes()).resolves.toEqual([
      { pid: 7, name: 'postgres', username: 'postgres', mem: 6 },
    ]);
  });
});

describe('network providers', () => {
  it('lists interfaces', async () => {
    await expect(networkProviders.interfaces()).resolves.toEqual(['lo', 'eth0']);
  });

  it('reads per-interface counters in MB', async () => {
    await expect(networkProviders.statistics()).resolves.toEqual({
      eth0: {
        mb_sent: 2,
        mb_received: 1,
        error_in: 1,
        error_out: 0,
        dropout: 5,
      },
    });
  });

  it('reads per-interface throughput in MB/s', async () => {
    await expect(networkProviders.averages()).resolves.toEqual({
      eth0: { interface: 'eth0', in: 0.5, out: 0.25 },
    });
  });

  it('reports empty wireless details without a connection', async () => {
    await expect(networkProviders.wireless()).resolves.toEqual({
      name: '',
      quality: '',
      channel: '',
      encryption: '',
      address: '',
      signal: '',
    });
  });

  it('reads the current wireless connection', async () => {
    mockHost.wifiConnections = [
      {
        ssid: 'lab-net',
        quality: 70,
        channel: 6,
        security: ['WPA2', 'WPA3'],
        bssid: 'aa:bb:cc:dd:ee:ff',
        signalLevel: -50,
      },
    ];
    try {
      await expect(networkProviders.wireless()).resolves.toEqual({
        name: 'lab-net',
        quality: '70',
        channel: '6',
        encryption: 'WPA2, WPA3',
        address: 'aa:bb:cc:dd:ee:ff',
        signal: '-50',
      });
    } finally {
      mockHost.wifiConnections = [];
    }
  });
});
