/**
 * Market Worker
 *
 * Polling loop for one market:
 *
 *   register -> [start-up offset] -> loop {
 *     eligible?  acquire turn -> cooldown -> scan -> release
 *     otherwise  yield turn
 *     sleep (single- or multi-market interval)
 *   } -> unregister
 *
 * Errors inside an iteration are logged and followed by a recovery sleep;
 * the loop only ends when the stop signal fires.
 */

import { systemClock, type Clock } from "../lib/clock.js";
import type { MarketId } from "../lib/options/types.js";
import type { ScanOptions, ScanResult } from "./big-options-processor.js";
import type { TurnCoordinator } from "./turn-coordinator.js";

export const DEFAULT_SINGLE_MARKET_INTERVAL_MS = 60_000;
export const DEFAULT_MULTI_MARKET_INTERVAL_MS = 120_000;
export const DEFAULT_STARTUP_OFFSET_MS = 60_000;
export const DEFAULT_RECOVERY_INTERVAL_MS = 60_000;

/** Anything that can run one scan pass for the market */
export interface MarketScanner {
  scan(options: ScanOptions): Promise<ScanResult>;
}

export type WorkerState = "idle" | "waiting" | "scanning" | "sleeping" | "stopped";

export interface WorkerStatus {
  market: MarketId;
  state: WorkerState;
  alive: boolean;
  iterations: number;
  scans: number;
  skipped: number;
  lastScanAt: string | null;
  lastResult: ScanResult | null;
  lastError: string | null;
}

export interface MarketWorkerOptions {
  market: MarketId;
  coordinator: TurnCoordinator<MarketId>;
  scanner: MarketScanner;
  /** Inside trading sessions right now */
  isTradingTime: () => boolean;
  /** Scan outside trading sessions as well */
  monitorOffHours?: boolean;
  singleMarketIntervalMs?: number;
  multiMarketIntervalMs?: number;
  startupOffsetMs?: number;
  recoveryIntervalMs?: number;
  clock?: Clock;
}

export class MarketWorker {
  readonly market: MarketId;
  private readonly coordinator: TurnCoordinator<MarketId>;
  private readonly scanner: MarketScanner;
  private readonly isTradingTime: () => boolean;
  private readonly monitorOffHours: boolean;
  private readonly singleMarketIntervalMs: number;
  private readonly multiMarketIntervalMs: number;
  private readonly startupOffsetMs: number;
  private readonly recoveryIntervalMs: number;
  private readonly clock: Clock;

  private running: Promise<void> | null = null;
  private status: WorkerStatus;

  constructor(options: MarketWorkerOptions) {
    this.market = options.market;
    this.coordinator = options.coordinator;
    this.scanner = options.scanner;
    this.isTradingTime = options.isTradingTime;
    this.monitorOffHours = options.monitorOffHours ?? false;
    this.singleMarketIntervalMs = options.singleMarketIntervalMs ?? DEFAULT_SINGLE_MARKET_INTERVAL_MS;
    this.multiMarketIntervalMs = options.multiMarketIntervalMs ?? DEFAULT_MULTI_MARKET_INTERVAL_MS;
    this.startupOffsetMs = options.startupOffsetMs ?? DEFAULT_STARTUP_OFFSET_MS;
    this.recoveryIntervalMs = options.recoveryIntervalMs ?? DEFAULT_RECOVERY_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
    this.status = {
      market: this.market,
      state: "idle",
      alive: false,
      iterations: 0,
      scans: 0,
      skipped: 0,
      lastScanAt: null,
      lastResult: null,
      lastError: null,
    };
  }

  /**
   * Start the loop. The returned promise settles when the loop ends.
   */
  start(signal: AbortSignal): Promise<void> {
    if (this.running) return this.running;
    this.status.alive = true;
    this.running = this.run(signal).finally(() => {
      this.status.alive = false;
      this.status.state = "stopped";
      this.running = null;
    });
    return this.running;
  }

  get isAlive(): boolean {
    return this.status.alive;
  }

  getStatus(): WorkerStatus {
    return { ...this.status };
  }

  /**
   * Run a single iteration (eligibility check, turn, scan, release)
   * @returns true when a scan ran
   */
  async runOnce(signal?: AbortSignal): Promise<boolean> {
    const trading = this.isTradingTime();
    if (!trading && !this.monitorOffHours) {
      console.log(`💤 [${this.market}] Market closed, skipping cycle`);
      this.coordinator.yieldTurn(this.market);
      this.status.skipped++;
      return false;
    }

    this.status.state = "waiting";
    const acquired = await this.coordinator.acquireTurn(this.market, signal);
    if (!acquired) {
      this.status.skipped++;
      return false;
    }

    try {
      await this.coordinator.waitForCooldown(this.market, signal);
      if (signal?.aborted) return false;

      this.status.state = "scanning";
      const result = await this.scanner.scan({ tradingSession: trading, signal });
      this.status.scans++;
      this.status.lastScanAt = new Date(this.clock.now()).toISOString();
      this.status.lastResult = result;
      this.status.lastError = null;
      return true;
    } finally {
      this.coordinator.release(this.market);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const isFirst = this.coordinator.activeCount === 0;
    this.coordinator.register(this.market);

    try {
      if (!isFirst && this.startupOffsetMs > 0) {
        console.log(`⏱️ [${this.market}] Waiting ${this.startupOffsetMs / 1000}s before first scan`);
        await this.clock.sleep(this.startupOffsetMs, signal);
      }

      while (!signal.aborted) {
        this.status.iterations++;
        let delayMs: number;
        try {
          await this.runOnce(signal);
          delayMs = this.coordinator.activeCount <= 1 ? this.singleMarketIntervalMs : this.multiMarketIntervalMs;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`❌ [${this.market}] Iteration failed: ${message}`);
          this.status.lastError = message;
          delayMs = this.recoveryIntervalMs;
        }

        if (signal.aborted) break;
        this.status.state = "sleeping";
        await this.clock.sleep(delayMs, signal);
      }
    } finally {
      this.coordinator.unregister(this.market);
      console.log(`🛑 [${this.market}] Worker stopped`);
    }
  }
}
