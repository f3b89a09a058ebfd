/**
 * Turn Coordinator
 *
 * The quote gateway accepts one caller at a time. Market workers take turns:
 * a binary token guards each unit of API work, and a turn pointer decides
 * which registered market may take the token next. After each unit of work
 * the turn passes to the next market in registration order.
 *
 * All state changes happen in synchronous sections between awaits, so the
 * event loop serializes them.
 */

import { systemClock, type Clock } from "../lib/clock.js";
import type { MarketId } from "../lib/options/types.js";

/**
 * Binary semaphore. release() hands the token directly to the oldest
 * blocked waiter, if any.
 */
export class BinaryToken {
  private held = false;
  private waiters: Array<(acquired: boolean) => void> = [];

  get isHeld(): boolean {
    return this.held;
  }

  tryAcquire(): boolean {
    if (this.held) return false;
    this.held = true;
    return true;
  }

  /** Resolves true once held, false when the signal aborts first */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.tryAcquire()) return Promise.resolve(true);

    return new Promise((resolve) => {
      const waiter = (acquired: boolean) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(acquired);
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(false);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next(true);
    } else {
      this.held = false;
    }
  }
}

export interface TurnCoordinatorOptions {
  /** Wait between turn checks */
  pollIntervalMs?: number;
  /** Turn checks before giving up on a cycle */
  maxWaitCycles?: number;
  /** Minimum spacing between a market's API work units */
  minApiIntervalMs?: number;
  clock?: Clock;
}

export interface TurnState<M extends string = MarketId> {
  activeMarkets: M[];
  currentTurn: M | null;
  holder: M | null;
  lastApiCall: Partial<Record<M, string>>;
}

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_WAIT_CYCLES = 60;
export const DEFAULT_MIN_API_INTERVAL_MS = 5_000;

export class TurnCoordinator<M extends string = MarketId> {
  private readonly pollIntervalMs: number;
  private readonly maxWaitCycles: number;
  private readonly minApiIntervalMs: number;
  private readonly clock: Clock;

  private readonly token = new BinaryToken();
  private active: M[] = [];
  private currentTurn: M | null = null;
  private holder: M | null = null;
  private readonly lastApiCall: Map<M, number> = new Map();

  constructor(options: TurnCoordinatorOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxWaitCycles = options.maxWaitCycles ?? DEFAULT_MAX_WAIT_CYCLES;
    this.minApiIntervalMs = options.minApiIntervalMs ?? DEFAULT_MIN_API_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
  }

  register(market: M): void {
    if (this.active.includes(market)) return;
    this.active.push(market);
    if (this.currentTurn === null) {
      this.currentTurn = market;
    }
    console.log(`🔗 [${market}] Registered (active: ${this.active.join(", ")}; turn: ${this.currentTurn})`);
  }

  unregister(market: M): void {
    if (!this.active.includes(market)) return;

    if (this.holder === market) {
      console.warn(`⚠️ [${market}] Unregistered while holding the API token, releasing it`);
      this.holder = null;
      this.token.release();
    }

    const next = this.nextAfter(market);
    this.active = this.active.filter((m) => m !== market);
    if (this.currentTurn === market) {
      this.currentTurn = next === market ? null : next;
    }
    console.log(`🔌 [${market}] Unregistered (active: ${this.active.join(", ") || "none"}; turn: ${this.currentTurn ?? "none"})`);
  }

  /**
   * Wait for this market's turn and take the API token.
   *
   * With a single active market only the token is awaited. Otherwise the
   * turn pointer is polled; false means the wait ran out (or was aborted)
   * and the caller should skip this cycle.
   */
  async acquireTurn(market: M, signal?: AbortSignal): Promise<boolean> {
    if (!this.active.includes(market)) {
      console.warn(`⚠️ [${market}] Cannot acquire a turn before registering`);
      return false;
    }

    if (this.active.length <= 1) {
      const acquired = await this.token.acquire(signal);
      if (acquired) this.holder = market;
      return acquired;
    }

    for (let cycle = 0; cycle < this.maxWaitCycles; cycle++) {
      if (signal?.aborted) return false;
      if (this.currentTurn === market && this.token.tryAcquire()) {
        this.holder = market;
        return true;
      }
      await this.clock.sleep(this.pollIntervalMs, signal);
    }

    if (!signal?.aborted) {
      const waitedSeconds = Math.round((this.maxWaitCycles * this.pollIntervalMs) / 1000);
      console.warn(`⚠️ [${market}] No turn after ${waitedSeconds}s (turn: ${this.currentTurn ?? "none"}), skipping this cycle`);
    }
    return false;
  }

  /**
   * Give back the token and pass the turn to the next market
   */
  release(market: M): void {
    if (this.holder !== market) {
      console.warn(`⚠️ [${market}] Release without holding the API token (holder: ${this.holder ?? "none"})`);
      return;
    }

    this.lastApiCall.set(market, this.clock.now());
    this.holder = null;
    this.token.release();

    if (this.active.length > 1) {
      this.currentTurn = this.nextAfter(market);
    }
  }

  /**
   * Pass the turn on without API work (market closed this cycle)
   */
  yieldTurn(market: M): void {
    if (this.currentTurn !== market || this.active.length <= 1) return;
    this.currentTurn = this.nextAfter(market);
    console.log(`↪️ [${market}] Skipping cycle, turn passed to ${this.currentTurn}`);
  }

  /**
   * Sleep out the rest of the minimum interval since this market's last API work
   */
  async waitForCooldown(market: M, signal?: AbortSignal): Promise<void> {
    const last = this.lastApiCall.get(market);
    if (last === undefined) return;

    const remaining = this.minApiIntervalMs - (this.clock.now() - last);
    if (remaining > 0) {
      console.log(`⏳ [${market}] API cooldown ${(remaining / 1000).toFixed(1)}s`);
      await this.clock.sleep(remaining, signal);
    }
  }

  get activeCount(): number {
    return this.active.length;
  }

  getState(): TurnState<M> {
    const lastApiCall: Partial<Record<M, string>> = {};
    for (const [market, time] of this.lastApiCall) {
      lastApiCall[market] = new Date(time).toISOString();
    }
    return {
      activeMarkets: [...this.active],
      currentTurn: this.currentTurn,
      holder: this.holder,
      lastApiCall,
    };
  }

  private nextAfter(market: M): M | null {
    if (this.active.length === 0) return null;
    const index = this.active.indexOf(market);
    if (index < 0) return this.active[0];
    return this.active[(index + 1) % this.active.length];
  }
}
