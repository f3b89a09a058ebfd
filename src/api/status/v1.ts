import { Request, Response } from "express";
import type { MonitorStatus } from "../../monitor/multi-market-monitor.js";

/**
 * Monitor Status
 * Turn state, per-market worker status and tracker sizes
 */
export function createStatusHandler(getMonitorStatus: () => MonitorStatus) {
  return function statusHandler(_req: Request, res: Response): void {
    try {
      res.json({
        success: true,
        timestamp: new Date().toISOString(),
        ...getMonitorStatus(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Error reading monitor status:", message);
      res.status(500).json({
        success: false,
        error: "Failed to read monitor status",
        message,
      });
    }
  };
}
