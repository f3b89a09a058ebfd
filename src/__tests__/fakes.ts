/**
 * In-process stand-ins for the clock, gateway, store and notifier
 */

import type { Clock } from "../lib/clock.js";
import type { RawRow } from "../lib/options/coerce.js";
import { RET_OK, type ApiResponse, type DateRange, type MarketDataClient, type OptionClassFilter } from "../lib/gateway/types.js";
import type { Notifier, NotifyContext } from "../lib/notify/notifier.js";
import type { OpenInterestPair, StockInfo, TradeStore } from "../lib/options/trade-store.js";
import type { MarketId, TradeEvent } from "../lib/options/types.js";

/**
 * Clock whose sleeps advance time instantly. onSleep runs after the time
 * has moved, before the sleep resolves.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void | Promise<void>) | null = null;

  constructor(public time: number = Date.UTC(2025, 8, 19, 2, 0, 0)) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (signal?.aborted) return;
    this.time += ms;
    if (this.onSleep) await this.onSleep(ms);
  }
}

export function ok(rows: RawRow[]): ApiResponse<RawRow> {
  return { status: RET_OK, rows };
}

export interface GatewayData {
  /** Underlying quotes and option snapshots by code */
  snapshots: Record<string, RawRow>;
  /** Expiry dates per underlying */
  expirations: Record<string, string[]>;
  /** Chain rows per underlying and expiry ("HK.00700|2025-09-29") */
  chains: Record<string, RawRow[]>;
}

export class FakeMarketDataClient implements MarketDataClient {
  readonly calls: string[] = [];
  readonly snapshotRequests: string[][] = [];

  constructor(public data: GatewayData) {}

  async getMarketSnapshot(codes: string[]): Promise<ApiResponse<RawRow>> {
    this.calls.push(`snapshot:${codes.length}`);
    this.snapshotRequests.push(codes);
    const rows = codes.flatMap((code) => {
      const row = this.data.snapshots[code];
      return row ? [row] : [];
    });
    return ok(rows);
  }

  async getExpirationDates(underlyingCode: string): Promise<ApiResponse<RawRow>> {
    this.calls.push(`expirations:${underlyingCode}`);
    const dates = this.data.expirations[underlyingCode] ?? [];
    return ok(dates.map((date) => ({ strike_time: date })));
  }

  async getOptionChain(underlyingCode: string, range: DateRange, classFilter: OptionClassFilter): Promise<ApiResponse<RawRow>> {
    this.calls.push(`chain:${underlyingCode}:${range.start}:${classFilter}`);
    return ok(this.data.chains[`${underlyingCode}|${range.start}`] ?? []);
  }
}

export class MemoryTradeStore implements TradeStore {
  readonly trades: TradeEvent[] = [];
  readonly stockInfo: StockInfo[] = [];
  readonly calls: string[] = [];
  failSaves = false;
  failReads = false;

  async saveTrade(trade: TradeEvent): Promise<void> {
    if (this.failSaves) throw new Error("insert failed");
    this.trades.push(trade);
  }

  async getPreviousVolume(optionCode: string, tradingDay: string): Promise<number | null> {
    this.calls.push(`volume:${optionCode}:${tradingDay}`);
    if (this.failReads) throw new Error("connection refused");
    const volumes = this.rowsFor(optionCode, tradingDay).map((trade) => trade.volume);
    return volumes.length > 0 ? Math.max(...volumes) : null;
  }

  async getPreviousOpenInterest(optionCode: string, tradingDay: string): Promise<OpenInterestPair | null> {
    this.calls.push(`oi:${optionCode}:${tradingDay}`);
    if (this.failReads) throw new Error("connection refused");
    const rows = this.rowsFor(optionCode, tradingDay);
    const last = rows[rows.length - 1];
    return last ? { openInterest: last.openInterest, netOpenInterest: last.netOpenInterest } : null;
  }

  async getTodayVolumes(market: MarketId, tradingDay: string): Promise<Map<string, number>> {
    this.calls.push(`today:${market}:${tradingDay}`);
    if (this.failReads) throw new Error("connection refused");
    const volumes: Map<string, number> = new Map();
    for (const trade of this.trades) {
      if (trade.market === market && trade.tradingDay === tradingDay) {
        volumes.set(trade.optionCode, Math.max(volumes.get(trade.optionCode) ?? 0, trade.volume));
      }
    }
    return volumes;
  }

  async saveStockInfo(info: StockInfo): Promise<void> {
    this.stockInfo.push(info);
  }

  private rowsFor(optionCode: string, tradingDay: string): TradeEvent[] {
    return this.trades.filter((trade) => trade.optionCode === optionCode && trade.tradingDay === tradingDay);
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: Array<{ message: string; context: NotifyContext }> = [];

  constructor(readonly name: string = "recording") {}

  async send(message: string, context: NotifyContext): Promise<void> {
    this.messages.push({ message, context });
  }
}

/**
 * Trade event with every field filled; override what the test cares about
 */
export function makeTradeEvent(overrides: Partial<TradeEvent> = {}): TradeEvent {
  return {
    optionCode: "HK.TCH250929C600000",
    underlyingCode: "HK.00700",
    lastPrice: 1.5,
    volume: 1000,
    turnover: 1_500_000,
    changeRate: 0,
    openInterest: 5000,
    netOpenInterest: 1200,
    updateTime: "2025-09-19 10:00:00",
    apiStrikePrice: 600,
    apiOptionType: "CALL",
    market: "HK",
    tradingDay: "2025-09-19",
    underlyingName: "Tencent",
    underlyingPrice: 610,
    strikePrice: 600,
    optionClass: "Call",
    expiryDate: "2025-09-29",
    priceDiff: -10,
    priceDiffPct: -1.639,
    previousVolume: 800,
    volumeDelta: 200,
    openInterestDelta: 300,
    netOpenInterestDelta: -50,
    isBigTrade: true,
    detectedAt: "2025-09-19T02:00:00.000Z",
    ...overrides,
  };
}
