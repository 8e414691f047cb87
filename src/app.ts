import { config, HOST, PORT } from 'App/config/config';
import { createAppContext } from './context';
import { buildServer, MonitorServer } from './server';

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Installs SIGINT/SIGTERM handlers that close the server gracefully. */
export const installShutdown = (monitor: MonitorServer): (() => void) => {
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Caught ${signal}, closing...`);
    // Force exit if hanging
    const force = setTimeout(() => process.exit(1), 10000).unref();
    try {
      await monitor.close();
      console.log('[Shutdown] HTTP server closed');
      process.exit(0);
    } catch (e) {
      console.error('[Shutdown] Error while closing', e);
      process.exit(1);
    } finally {
      clearTimeout(force);
    }
  };
  const handlers = SIGNALS.map(sig => {
    const handler = () => void shutdown(sig);
    process.once(sig, handler);
    return { sig, handler };
  });
  // uninstall
  return () =>
    handlers.forEach(({ sig, handler }) => process.removeListener(sig, handler));
};

export const main = async () => {
  const port = PORT || 4500;
  try {
    const monitor = buildServer(createAppContext(config));
    monitor.server.listen(port, HOST, () => {
      console.log(`Now listening on ${HOST}:${port}`);
    });
    installShutdown(monitor);
  } catch (err) {
    console.error(err);
  }
};

if (require.main === module) {
  void main();
}
