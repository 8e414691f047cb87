// src/routes/monitorRoutes.ts
import MonitorController from 'App/controllers/MonitorController';
import WorkerController from 'App/controllers/WorkerController';
import { requireAuth } from 'App/middlewares/requireAuth';
import { AuthService } from 'App/services/AuthService';
import { Router } from 'express';

export interface MonitorRoutesDeps {
  auth: AuthService;
  monitor: MonitorController;
  worker: WorkerController;
}

/** Bearer-protected routes. */
export const createMonitorRoutes = (deps: MonitorRoutesDeps): Router => {
  const monitorRoutes = Router();
  const authenticated = requireAuth(deps.auth);

  monitorRoutes.post('/worker', authenticated, deps.worker.create);
  monitorRoutes.get('/system', authenticated, deps.monitor.system);
  monitorRoutes.get('/network', authenticated, deps.monitor.network);

  return monitorRoutes;
};
