// src/controllers/MonitorController.ts
import { SnapshotService } from 'App/services/SnapshotService';
import { NextFunction, Request, Response } from 'express';

const TRUTHY = ['1', 'true', 'yes', 'on'];

class MonitorController {
  constructor(private readonly snapshots: SnapshotService) {}

  /**
   * GET /system
   * Returns one system snapshot; a failed domain carries a PROVIDER_FAILURE marker.
   */
  system = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await this.snapshots.getSystemSnapshot();
      return res.status(200).json(snapshot);
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /network
   * Query: averages=true adds per-interface throughput (MB/s).
   */
  network = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const raw = req.query.averages;
      const averages =
        typeof raw === 'string' && TRUTHY.includes(raw.toLowerCase());
      const snapshot = await this.snapshots.getNetworkSnapshot({ averages });
      return res.status(200).json(snapshot);
    } catch (err) {
      return next(err);
    }
  };
}

export default MonitorController;
