// src/routes/globalRoutes.ts
import { OffloadPool } from 'App/services/OffloadPool';
import { SessionRegistry } from 'App/services/SessionRegistry';
import { MonitorSocket } from 'App/types/socket';
import { Router } from 'express';

export interface GlobalRoutesDeps {
  registry: SessionRegistry<MonitorSocket>;
  pool: OffloadPool;
  activeStreams: () => number;
}

/** Unauthenticated routes: index and health. */
export const createGlobalRoutes = (deps: GlobalRoutesDeps): Router => {
  const globalRoutes = Router();

  globalRoutes.get('/', (_req, res) => {
    res.type('text/plain').send('silence is golden.');
  });

  globalRoutes.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      workers: deps.registry.stats(),
      streams: deps.activeStreams(),
      pool: deps.pool.stats(),
    });
  });

  return globalRoutes;
};
