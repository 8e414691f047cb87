// src/__tests__/app.test.ts

import { jest } from '@jest/globals';
import { waitFor } from './helpers/waitFor';

// Mock function for the HTTP server's listen method
const mockListen = jest.fn();
const mockClose = jest.fn(async () => {});

// Mocking the config module to return specific values for HOST and PORT
jest.mock('App/config/config', () => ({
  config: { mode: 'development' },
  HOST: '127.0.0.1',
  PORT: 4000,
}));

jest.mock('../context', () => ({
  createAppContext: jest.fn(() => ({})),
}));

// Mocking the server factory
jest.mock('../server', () => ({
  buildServer: jest.fn(() => ({
    server: { listen: mockListen },
    close: mockClose,
  })),
}));

// Spying on console methods to verify log messages
const consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

// Importing after the mocks are set
import { installShutdown, main } from '../app';
import type { MonitorServer } from '../server';

describe('Server entry point', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    // main() installs shutdown handlers; keep them off the real process
    jest.spyOn(process, 'once').mockReturnValue(process);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should start the server on HOST:PORT', async () => {
    await main();

    expect(mockListen).toHaveBeenCalledTimes(1);
    expect(mockListen).toHaveBeenCalledWith(
      4000,
      '127.0.0.1',
      expect.any(Function),
    );

    // Manually invoke the callback to simulate server startup
    const listenCallback = mockListen.mock.calls[0][2] as () => void;
    listenCallback();

    expect(consoleLogSpy).toHaveBeenCalledWith(
      'Now listening on 127.0.0.1:4000',
    );
  });

  it('should use port 4500 if PORT is not set', async () => {
    jest.resetModules();

    jest.doMock('../context', () => ({
      createAppContext: jest.fn(() => ({})),
    }));
    jest.doMock('App/config/config', () => ({
      config: { mode: 'production' },
      HOST: 'localhost',
      PORT: 0,
    }));
    const mockListenDefault = jest.fn();
    jest.doMock('../server', () => ({
      buildServer: jest.fn(() => ({
        server: { listen: mockListenDefault },
        close: jest.fn(async () => {}),
      })),
    }));

    const { main: mainDefault } = await import('../app');
    await mainDefault();

    expect(mockListenDefault).toHaveBeenCalledWith(
      4500,
      'localhost',
      expect.any(Function),
    );
  });

  it('should log an error if the server cannot be built', async () => {
    jest.resetModules();

    const failure = new Error('Failed to start server');
    jest.doMock('../context', () => ({
      createAppContext: jest.fn(() => ({})),
    }));
    jest.doMock('App/config/config', () => ({
      config: { mode: 'production' },
      HOST: 'localhost',
      PORT: 5000,
    }));
    jest.doMock('../server', () => ({
      buildServer: jest.fn(() => {
        throw failure;
      }),
    }));
    const consoleErrorSpy = jest
      .spyOn(console, 'error')
      .mockImplementation(() => {});

    const { main: mainFail } = await import('../app');
    await mainFail();

    expect(consoleErrorSpy).toHaveBeenCalledWith(failure);
  });

  it('should close the server and exit 0 on SIGTERM', async () => {
    jest.mocked(process.once).mockRestore();
    const exitSpy = jest
      .spyOn(process, 'exit')
      .mockImplementation((() => undefined) as () => never);
    const close = jest.fn(async () => {});

    const uninstall = installShutdown({ close } as unknown as MonitorServer);
    try {
      process.emit('SIGTERM', 'SIGTERM');

      await waitFor(() => exitSpy.mock.calls.length > 0);
      expect(close).toHaveBeenCalledTimes(1);
      expect(exitSpy).toHaveBeenCalledWith(0);
    } finally {
      uninstall();
      exitSpy.mockRestore();
    }
  });
});
