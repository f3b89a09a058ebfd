import { Request, Response } from "express";
import type { Queryable } from "../../lib/db.js";
import type { MonitorStatus } from "../../monitor/multi-market-monitor.js";

export interface HealthDeps {
  db: Queryable;
  getMonitorStatus: () => MonitorStatus;
}

/**
 * Health Check
 * 503 when the database does not answer
 */
export function createHealthHandler(deps: HealthDeps) {
  return async function healthHandler(_req: Request, res: Response): Promise<void> {
    try {
      await deps.db.query("SELECT 1");
      const status = deps.getMonitorStatus();

      res.status(200).json({
        status: "healthy",
        timestamp: new Date().toISOString(),
        database: "connected",
        monitor: {
          running: status.running,
          markets: status.workers.map((worker) => ({
            market: worker.market,
            alive: worker.alive,
            state: worker.marketState,
            lastScanAt: worker.lastScanAt,
          })),
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Health check failed:", message);
      res.status(503).json({
        status: "unhealthy",
        timestamp: new Date().toISOString(),
        database: "disconnected",
        error: message,
      });
    }
  };
}
