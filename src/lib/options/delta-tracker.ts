/**
 * Delta Tracker
 *
 * The gateway only reports cumulative session counters. The tracker keeps
 * the last seen counters per option for the current trading day so each
 * cycle can compute what was added since the previous one.
 *
 * State is hydrated lazily from the store the first time an option is seen
 * on a trading day (the process may have restarted mid-session), then kept
 * in memory. A new trading-day key discards everything.
 */

import type { TradeStore } from "./trade-store.js";
import type { MarketId, VolumeObservation, VolumeState } from "./types.js";

export interface DeltaTrackerOptions {
  market: MarketId;
  store: TradeStore;
  /** Current trading-day key (YYYY-MM-DD in the market's time zone) */
  tradingDay: () => string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DeltaTracker {
  private readonly market: MarketId;
  private readonly store: TradeStore;
  private readonly tradingDay: () => string;

  private day: string | null = null;
  private entries: Map<string, VolumeState> = new Map();
  private hydrating: Map<string, Promise<VolumeState>> = new Map();
  private todayVolumes: Promise<Map<string, number>> | null = null;

  constructor(options: DeltaTrackerOptions) {
    this.market = options.market;
    this.store = options.store;
    this.tradingDay = options.tradingDay;
  }

  /**
   * Previous cumulative volume for the option on the current trading day.
   * 0 when the option has no history today.
   */
  async getPreviousVolume(optionCode: string, currentVolume: number): Promise<number> {
    const state = await this.ensureState(optionCode);
    if (currentVolume < state.previousVolume) {
      console.warn(
        `⚠️ [${this.market}] ${optionCode} volume went backwards: ${state.previousVolume} -> ${currentVolume}`
      );
    }
    return state.previousVolume;
  }

  /**
   * Previous open interest and net open interest, [0, 0] without history
   */
  async getPreviousOpenInterest(optionCode: string): Promise<[number, number]> {
    const state = await this.ensureState(optionCode);
    return [state.previousOpenInterest, state.previousNetOpenInterest];
  }

  /**
   * Store the counters observed this cycle. Volume never moves backwards
   * within a trading day.
   */
  recordCurrent(optionCode: string, observation: VolumeObservation): void {
    this.rollover();
    const existing = this.entries.get(optionCode);
    this.entries.set(optionCode, {
      previousVolume: Math.max(existing?.previousVolume ?? 0, observation.volume),
      previousOpenInterest: observation.openInterest,
      previousNetOpenInterest: observation.netOpenInterest,
    });
  }

  /** Trading day the cache belongs to (null before first use) */
  get currentDay(): string | null {
    return this.day;
  }

  get size(): number {
    return this.entries.size;
  }

  private rollover(): string {
    const today = this.tradingDay();
    if (today !== this.day) {
      if (this.day !== null) {
        console.log(`📅 [${this.market}] Trading day ${this.day} -> ${today}, resetting ${this.entries.size} tracked option(s)`);
      }
      this.day = today;
      this.entries = new Map();
      this.hydrating = new Map();
      this.todayVolumes = null;
    }
    return today;
  }

  private async ensureState(optionCode: string): Promise<VolumeState> {
    const day = this.rollover();

    const cached = this.entries.get(optionCode);
    if (cached) return cached;

    const pending = this.hydrating.get(optionCode);
    if (pending) return pending;

    const hydration = this.hydrate(optionCode, day);
    const hydrating = this.hydrating;
    hydrating.set(optionCode, hydration);

    try {
      const state = await hydration;
      // A rollover during hydration replaced the maps; the result belongs to the old day
      if (this.day === day && !this.entries.has(optionCode)) {
        this.entries.set(optionCode, state);
      }
      return this.day === day ? (this.entries.get(optionCode) ?? state) : state;
    } finally {
      hydrating.delete(optionCode);
    }
  }

  private async hydrate(optionCode: string, day: string): Promise<VolumeState> {
    const volumes = await this.loadTodayVolumes(day);

    let previousVolume = volumes.get(optionCode);
    if (previousVolume === undefined) {
      try {
        previousVolume = (await this.store.getPreviousVolume(optionCode, day)) ?? 0;
      } catch (error) {
        console.error(`❌ [${this.market}] Failed to load previous volume for ${optionCode}: ${describe(error)}`);
        previousVolume = 0;
      }
    }

    let openInterest = 0;
    let netOpenInterest = 0;
    try {
      const pair = await this.store.getPreviousOpenInterest(optionCode, day);
      if (pair) {
        openInterest = pair.openInterest;
        netOpenInterest = pair.netOpenInterest;
      }
    } catch (error) {
      console.error(`❌ [${this.market}] Failed to load previous open interest for ${optionCode}: ${describe(error)}`);
    }

    return {
      previousVolume,
      previousOpenInterest: openInterest,
      previousNetOpenInterest: netOpenInterest,
    };
  }

  private loadTodayVolumes(day: string): Promise<Map<string, number>> {
    if (!this.todayVolumes) {
      this.todayVolumes = this.store.getTodayVolumes(this.market, day).then(
        (volumes) => {
          console.log(`📊 [${this.market}] Loaded ${volumes.size} option volume(s) for ${day}`);
          return volumes;
        },
        (error: unknown) => {
          console.error(`❌ [${this.market}] Failed to load today's volumes: ${describe(error)}`);
          return new Map<string, number>();
        }
      );
    }
    return this.todayVolumes;
  }
}
