import AuthController from 'App/controllers/AuthController';
import MonitorController from 'App/controllers/MonitorController';
import WorkerController from 'App/controllers/WorkerController';
import { AppContext } from 'App/context';
import errorHandler from 'App/middlewares/errorHandler';
import { createCorsOptions } from 'App/middlewares/corsPolicy';
import handleCorsError from 'App/middlewares/handleCorsError';
import { initWebSockets, MonitorIoServer } from 'App/providers/WebSocketsProvider';
import { createRateLimiters } from 'App/rateLimiters/generalRateLimiter';
import { createAuthRoutes } from 'App/routes/authRoutes';
import { createGlobalRoutes } from 'App/routes/globalRoutes';
import { createMonitorRoutes } from 'App/routes/monitorRoutes';
import cors from 'cors';
import express, { Express } from 'express';
import helmet from 'helmet';
import http from 'http';
import morgan from 'morgan';
// ------------------------------------------------------------------------------

const maxBodySize = '16kb';

export interface MonitorServer {
  app: Express;
  server: http.Server;
  io: MonitorIoServer;
  /** Stops the sweeper, drops every stream and closes the HTTP server and pool. */
  close(): Promise<void>;
}

/**
 * Wires the HTTP routes and the streaming endpoint around one AppContext.
 * The returned server is not listening yet.
 */
export const buildServer = (ctx: AppContext): MonitorServer => {
  const { config, registry, pool } = ctx;
  const production = config.mode === 'production';

  const app = express();

  // Parse JSON bodies (as sent by API clients)
  app.use(express.json({ limit: maxBodySize }));

  if (production) {
    app.enable('trust proxy');

    app.disable('x-powered-by');

    app.use(
      helmet({
        crossOriginResourcePolicy: { policy: 'cross-origin' },
        referrerPolicy: { policy: ['origin', 'unsafe-url'] },
        strictTransportSecurity: { maxAge: 31536000, includeSubDomains: false },
        xFrameOptions: { action: 'deny' },
      }),
    );
    // adding morgan to log HTTP requests
    app.use(morgan('common'));
  }

  app.use(cors(createCorsOptions(config.corsOrigins)));
  app.use(handleCorsError);

  const server = http.createServer(app);

  // Socket.IO on the same HTTP server, path /connect
  const ws = initWebSockets(server, {
    registry,
    snapshots: ctx.snapshots,
    publishIntervalMs: config.publishIntervalMs,
    maxStalledTicks: config.maxStalledTicks,
    maxConnections: config.maxWsConnections,
    corsOrigins: config.corsOrigins,
  });

  const limiters = production ? createRateLimiters(config) : null;
  if (limiters) {
    app.use(limiters.general);
  }

  /* Routes */
  app.use('/', [
    createGlobalRoutes({ registry, pool, activeStreams: ws.activeStreams }),
    createAuthRoutes(
      new AuthController(ctx.auth),
      limiters ? [limiters.auth] : [],
    ),
    createMonitorRoutes({
      auth: ctx.auth,
      monitor: new MonitorController(ctx.snapshots),
      worker: new WorkerController(registry),
    }),
  ]);

  app.use(errorHandler);

  // Unclaimed workers are recycled after the grace period
  registry.startSweeper(config.workerSweepMs);

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        registry.closeAll();
        // io.close() also closes the HTTP server
        await new Promise<void>(resolve => {
          ws.io.close(err => {
            if (err && server.listening) {
              console.error('[Server] Error while closing:', err);
            }
            resolve();
          });
        });
        await pool.close();
      })();
    }
    return closing;
  };

  return { app, server, io: ws.io, close };
};
