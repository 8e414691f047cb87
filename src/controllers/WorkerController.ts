// src/controllers/WorkerController.ts
import { claimsOf } from 'App/middlewares/requireAuth';
import { SessionRegistry } from 'App/services/SessionRegistry';
import { MonitorSocket } from 'App/types/socket';
import { NextFunction, Request, Response } from 'express';

class WorkerController {
  constructor(private readonly registry: SessionRegistry<MonitorSocket>) {}

  /**
   * POST /worker
   * Creates a worker bound to the token's subject. The caller must open the
   * stream with this id before the grace period runs out.
   */
  create = (req: Request, res: Response, next: NextFunction) => {
    try {
      const { subject } = claimsOf(req);
      const id = this.registry.create(subject);
      return res.status(200).json({ id });
    } catch (err) {
      return next(err);
    }
  };
}

export default WorkerController;
