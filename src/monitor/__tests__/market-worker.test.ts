import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ScanOptions, ScanResult } from "../big-options-processor.js";
import { MarketWorker, type MarketScanner } from "../market-worker.js";
import { TurnCoordinator } from "../turn-coordinator.js";
import type { MarketId } from "../../lib/options/types.js";
import { ManualClock } from "../../__tests__/fakes.js";

function emptyResult(market: MarketId): ScanResult {
  return {
    market,
    underlyings: 0,
    optionsSeen: 0,
    saved: 0,
    bigTrades: 0,
    notified: 0,
    failedUnderlyings: [],
    durationMs: 0,
  };
}

class FakeScanner implements MarketScanner {
  readonly calls: ScanOptions[] = [];
  failWith: Error | null = null;

  constructor(
    private readonly market: MarketId,
    private readonly log: MarketId[] = []
  ) {}

  async scan(options: ScanOptions): Promise<ScanResult> {
    this.calls.push(options);
    this.log.push(this.market);
    if (this.failWith) throw this.failWith;
    return emptyResult(this.market);
  }
}

describe("MarketWorker", () => {
  let clock: ManualClock;
  let coordinator: TurnCoordinator<MarketId>;

  beforeEach(() => {
    clock = new ManualClock(0);
    coordinator = new TurnCoordinator<MarketId>({ clock });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("runOnce", () => {
    it("scans during trading hours and releases the turn", async () => {
      const scanner = new FakeScanner("HK");
      const worker = new MarketWorker({ market: "HK", coordinator, scanner, isTradingTime: () => true, clock });
      coordinator.register("HK");

      expect(await worker.runOnce()).toBe(true);

      expect(scanner.calls).toEqual([{ tradingSession: true, signal: undefined }]);
      expect(coordinator.getState().holder).toBeNull();
      expect(worker.getStatus()).toMatchObject({ scans: 1, lastResult: emptyResult("HK"), lastError: null });
    });

    it("yields the turn when the market is closed", async () => {
      const scanner = new FakeScanner("HK");
      const worker = new MarketWorker({ market: "HK", coordinator, scanner, isTradingTime: () => false, clock });
      coordinator.register("HK");
      coordinator.register("US");

      expect(await worker.runOnce()).toBe(false);

      expect(scanner.calls).toEqual([]);
      expect(coordinator.getState().currentTurn).toBe("US");
      expect(worker.getStatus().skipped).toBe(1);
    });

    it("scans off-hours when the override is on", async () => {
      const scanner = new FakeScanner("US");
      const worker = new MarketWorker({
        market: "US",
        coordinator,
        scanner,
        isTradingTime: () => false,
        monitorOffHours: true,
        clock,
      });
      coordinator.register("US");

      expect(await worker.runOnce()).toBe(true);
      expect(scanner.calls[0].tradingSession).toBe(false);
    });

    it("releases the turn when the scan throws", async () => {
      const scanner = new FakeScanner("HK");
      scanner.failWith = new Error("gateway down");
      const worker = new MarketWorker({ market: "HK", coordinator, scanner, isTradingTime: () => true, clock });
      coordinator.register("HK");
      coordinator.register("US");

      await expect(worker.runOnce()).rejects.toThrow("gateway down");
      expect(coordinator.getState()).toMatchObject({ holder: null, currentTurn: "US" });
    });
  });

  describe("loop", () => {
    it("sleeps the single-market interval between scans and unregisters on stop", async () => {
      const controller = new AbortController();
      const scanner = new FakeScanner("HK");
      const worker = new MarketWorker({ market: "HK", coordinator, scanner, isTradingTime: () => true, clock });
      clock.onSleep = () => controller.abort();

      await worker.start(controller.signal);

      expect(scanner.calls).toHaveLength(1);
      expect(clock.sleeps).toEqual([60_000]);
      expect(coordinator.activeCount).toBe(0);
      expect(worker.getStatus()).toMatchObject({ alive: false, state: "stopped", iterations: 1 });
    });

    it("sleeps the recovery interval after a failed iteration", async () => {
      const controller = new AbortController();
      const scanner = new FakeScanner("HK");
      scanner.failWith = new Error("unexpected payload");
      const worker = new MarketWorker({
        market: "HK",
        coordinator,
        scanner,
        isTradingTime: () => true,
        recoveryIntervalMs: 30_000,
        clock,
      });
      clock.onSleep = () => controller.abort();

      await worker.start(controller.signal);

      expect(clock.sleeps).toEqual([30_000]);
      expect(worker.getStatus().lastError).toBe("unexpected payload");
      expect(coordinator.activeCount).toBe(0);
    });

    it("waits the start-up offset when another market registered first", async () => {
      const controller = new AbortController();
      const scanner = new FakeScanner("US");
      coordinator.register("HK");
      const worker = new MarketWorker({
        market: "US",
        coordinator,
        scanner,
        isTradingTime: () => true,
        startupOffsetMs: 45_000,
        clock,
      });
      clock.onSleep = () => controller.abort();

      await worker.start(controller.signal);

      expect(clock.sleeps).toEqual([45_000]);
      expect(scanner.calls).toEqual([]);
      expect(coordinator.getState().activeMarkets).toEqual(["HK"]);
    });

    it("alternates two markets over one coordinator", async () => {
      const controller = new AbortController();
      const log: MarketId[] = [];
      const hk = new MarketWorker({
        market: "HK",
        coordinator,
        scanner: new FakeScanner("HK", log),
        isTradingTime: () => true,
        clock,
      });
      const us = new MarketWorker({
        market: "US",
        coordinator,
        scanner: new FakeScanner("US", log),
        isTradingTime: () => true,
        clock,
      });
      clock.onSleep = () => {
        if (log.length >= 2 || clock.sleeps.length > 500) controller.abort();
      };

      await Promise.all([hk.start(controller.signal), us.start(controller.signal)]);

      expect(log.slice(0, 2)).toEqual(["HK", "US"]);
      expect(clock.sleeps).toContain(60_000);
      expect(clock.sleeps).toContain(120_000);
      expect(coordinator.activeCount).toBe(0);
    });
  });
});
