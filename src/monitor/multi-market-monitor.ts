/**
 * Multi-Market Monitor
 *
 * Runs one worker per enabled market over a shared turn coordinator and
 * supervises them: every status interval it logs each market's state and
 * restarts any worker whose loop has ended.
 */

import { systemClock, type Clock } from "../lib/clock.js";
import { ConfigError, enabledMarkets, type MonitorConfig } from "../lib/config.js";
import type { MarketDataClient } from "../lib/gateway/types.js";
import { describeMarketState, isTradingTime } from "../lib/market-hours.js";
import type { NotificationService } from "../lib/notify/notifier.js";
import type { TradeStore } from "../lib/options/trade-store.js";
import type { MarketId } from "../lib/options/types.js";
import { BigOptionsProcessor } from "./big-options-processor.js";
import { MarketWorker, type MarketScanner, type WorkerStatus } from "./market-worker.js";
import { TurnCoordinator, type TurnState } from "./turn-coordinator.js";

/** Supervisor status / liveness check period */
export const STATUS_INTERVAL_MS = 10 * 60 * 1000;

export interface MultiMarketMonitorOptions {
  config: MonitorConfig;
  client: MarketDataClient;
  store: TradeStore;
  notifications: NotificationService;
  clock?: Clock;
  statusIntervalMs?: number;
  /** Scanner factory, defaults to a BigOptionsProcessor per market */
  createScanner?: (market: MarketId) => MarketScanner & { trackedOptions?: number };
}

export interface MonitorStatus {
  running: boolean;
  startedAt: string | null;
  turn: TurnState<MarketId>;
  workers: Array<
    WorkerStatus & {
      marketState: ReturnType<typeof describeMarketState>;
      trackedOptions: number | null;
      restarts: number;
    }
  >;
}

interface WorkerEntry {
  worker: MarketWorker;
  scanner: MarketScanner & { trackedOptions?: number };
  restarts: number;
}

export class MultiMarketMonitor {
  private readonly config: MonitorConfig;
  private readonly clock: Clock;
  private readonly statusIntervalMs: number;
  private readonly coordinator: TurnCoordinator<MarketId>;
  private readonly entries: Map<MarketId, WorkerEntry> = new Map();

  private controller: AbortController | null = null;
  private supervisor: ReturnType<typeof setInterval> | null = null;
  private loops: Set<Promise<void>> = new Set();
  private startedAt: number | null = null;

  constructor(options: MultiMarketMonitorOptions) {
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.statusIntervalMs = options.statusIntervalMs ?? STATUS_INTERVAL_MS;
    this.coordinator = new TurnCoordinator<MarketId>({
      minApiIntervalMs: this.config.minApiIntervalMs,
      clock: this.clock,
    });

    const markets = enabledMarkets(this.config);
    if (markets.length === 0) {
      throw new ConfigError("No market has any configured underlying; nothing to monitor");
    }

    const createScanner =
      options.createScanner ??
      ((market: MarketId) =>
        new BigOptionsProcessor({
          market: this.config.markets[market],
          client: options.client,
          store: options.store,
          notifications: options.notifications,
          thresholds: this.config.thresholds,
          expiryWindowDays: this.config.expiryWindowDays,
          fallbackExpiryCount: this.config.fallbackExpiryCount,
          notifyCooldownMs: this.config.notifyCooldownMs,
          clock: this.clock,
        }));

    for (const market of markets) {
      const marketConfig = this.config.markets[market];
      const scanner = createScanner(market);
      const worker = new MarketWorker({
        market,
        coordinator: this.coordinator,
        scanner,
        isTradingTime: () => isTradingTime(marketConfig.schedule, new Date(this.clock.now())),
        monitorOffHours: marketConfig.monitorOffHours,
        singleMarketIntervalMs: this.config.singleMarketIntervalMs,
        multiMarketIntervalMs: this.config.multiMarketIntervalMs,
        clock: this.clock,
      });
      this.entries.set(market, { worker, scanner, restarts: 0 });
    }
  }

  get markets(): MarketId[] {
    return [...this.entries.keys()];
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    this.startedAt = this.clock.now();

    console.log("═".repeat(50));
    console.log(`🚀 Options monitor starting: ${this.markets.join(", ")}`);
    for (const market of this.markets) {
      const marketConfig = this.config.markets[market];
      console.log(
        `   ${market}: ${marketConfig.stocks.length} underlying(s), ${marketConfig.schedule.timezone}` +
          (marketConfig.monitorOffHours ? " (off-hours monitoring on)" : "")
      );
    }
    console.log("═".repeat(50));

    for (const entry of this.entries.values()) {
      this.launch(entry);
    }

    this.supervisor = setInterval(() => this.supervise(), this.statusIntervalMs);
  }

  /**
   * Signal every loop to stop and wait for them to finish
   */
  async stop(): Promise<void> {
    if (!this.controller) return;
    console.log("🛑 Stopping options monitor...");
    this.controller.abort();
    if (this.supervisor) {
      clearInterval(this.supervisor);
      this.supervisor = null;
    }
    await Promise.allSettled([...this.loops]);
    this.controller = null;
    console.log("✅ Options monitor stopped");
  }

  /**
   * Log market states and restart dead workers
   */
  supervise(): void {
    const signal = this.controller?.signal;
    if (!signal || signal.aborted) return;

    const now = new Date(this.clock.now());
    console.log(`📋 Monitor status (${now.toISOString()})`);
    for (const [market, entry] of this.entries) {
      const marketConfig = this.config.markets[market];
      const state = describeMarketState(marketConfig.schedule, marketConfig.monitorOffHours, now);
      const status = entry.worker.getStatus();
      console.log(
        `   ${market}: ${status.alive ? "alive" : "dead"}, ${state}, scans ${status.scans}, skipped ${status.skipped}` +
          (status.lastError ? `, last error: ${status.lastError}` : "")
      );

      if (!entry.worker.isAlive) {
        entry.restarts++;
        console.warn(`⚠️ [${market}] Worker not running, restarting (restart #${entry.restarts})`);
        this.launch(entry);
      }
    }
  }

  getStatus(): MonitorStatus {
    const now = new Date(this.clock.now());
    return {
      running: this.isRunning,
      startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      turn: this.coordinator.getState(),
      workers: [...this.entries.entries()].map(([market, entry]) => {
        const marketConfig = this.config.markets[market];
        return {
          ...entry.worker.getStatus(),
          marketState: describeMarketState(marketConfig.schedule, marketConfig.monitorOffHours, now),
          trackedOptions: entry.scanner.trackedOptions ?? null,
          restarts: entry.restarts,
        };
      }),
    };
  }

  private launch(entry: WorkerEntry): void {
    const signal = this.controller?.signal;
    if (!signal) return;

    const loop = entry.worker.start(signal).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ [${entry.worker.market}] Worker crashed: ${message}`);
    });
    this.loops.add(loop);
    void loop.finally(() => this.loops.delete(loop));
  }
}
