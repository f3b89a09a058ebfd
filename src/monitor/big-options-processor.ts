/**
 * Big Options Processor
 *
 * One scan pass over a market's configured underlyings:
 *
 *   underlying quotes -> expiries -> option chains -> strike window
 *   -> option snapshots -> deltas -> classification -> store -> notify
 *
 * Every gateway call goes through invokeWithRetry. A failing underlying is
 * logged and skipped; the pass carries on with the next one.
 */

import { systemClock, type Clock } from "../lib/clock.js";
import type { MarketConfig } from "../lib/config.js";
import type { MarketDataClient } from "../lib/gateway/types.js";
import { tradingDayKey } from "../lib/market-hours.js";
import { formatSummaryReport } from "../lib/notify/report.js";
import type { NotificationService } from "../lib/notify/notifier.js";
import { BigTradeClassifier, NotificationLog } from "../lib/options/classifier.js";
import { toFloat, toOptionSnapshot, toStr, type RawRow } from "../lib/options/coerce.js";
import { DeltaTracker } from "../lib/options/delta-tracker.js";
import { parseOptionCode } from "../lib/options/option-code.js";
import { selectStrikes } from "../lib/options/strike-window.js";
import type { StockInfo, TradeStore } from "../lib/options/trade-store.js";
import type {
  ChainEntry,
  MarketId,
  OptionClass,
  ThresholdTable,
  TradeEvent,
  UnderlyingQuote,
} from "../lib/options/types.js";
import { API_RETRY, OPERATION_RETRY, invokeWithRetry, withRetry, type RetryPolicy } from "../lib/retry.js";

/** Underlying quotes are refreshed after this long */
export const QUOTE_CACHE_TTL_MS = 5 * 60 * 1000;

/** Most codes per snapshot request */
export const SNAPSHOT_BATCH_SIZE = 400;

/** Pause between consecutive gateway calls */
export const INTER_CALL_DELAY_MS = 1_000;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface BigOptionsProcessorOptions {
  market: MarketConfig;
  client: MarketDataClient;
  store: TradeStore;
  notifications: NotificationService;
  thresholds: ThresholdTable;
  expiryWindowDays?: number;
  fallbackExpiryCount?: number;
  notifyCooldownMs?: number;
  clock?: Clock;
  /** Overrides for the gateway retry policy (attempts, delay) */
  apiRetry?: Pick<RetryPolicy, "maxRetries" | "delayMs">;
  interCallDelayMs?: number;
}

export interface ScanOptions {
  /** Inside the market's trading sessions (extra webhooks only then) */
  tradingSession: boolean;
  signal?: AbortSignal;
}

export interface ScanResult {
  market: MarketId;
  underlyings: number;
  optionsSeen: number;
  saved: number;
  bigTrades: number;
  notified: number;
  failedUnderlyings: string[];
  durationMs: number;
}

interface CachedQuote extends UnderlyingQuote {
  fetchedAt: number;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** "2025-09-26 00:00:00" -> "2025-09-26" */
function toIsoDate(value: unknown): string | null {
  const text = toStr(value).trim().slice(0, 10);
  return /^\d{4}-\d{2}-\d{2}$/.test(text) ? text : null;
}

function addDays(isoDate: string, days: number): string {
  return new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

function toOptionClass(apiType: string): OptionClass | null {
  const normalized = apiType.trim().toUpperCase();
  if (normalized === "CALL" || normalized === "C") return "Call";
  if (normalized === "PUT" || normalized === "P") return "Put";
  return null;
}

/**
 * Expiries to scan: those within windowDays of today, else the first few
 */
export function selectExpiries(dates: string[], today: string, windowDays: number, fallbackCount: number): string[] {
  const sorted = [...new Set(dates)].sort();
  const limit = addDays(today, windowDays);
  const inWindow = sorted.filter((date) => date >= today && date <= limit);
  return inWindow.length > 0 ? inWindow : sorted.slice(0, fallbackCount);
}

export class BigOptionsProcessor {
  private readonly market: MarketConfig;
  private readonly client: MarketDataClient;
  private readonly store: TradeStore;
  private readonly notifications: NotificationService;
  private readonly classifier: BigTradeClassifier;
  private readonly notificationLog: NotificationLog;
  private readonly tracker: DeltaTracker;
  private readonly clock: Clock;
  private readonly apiRetry: Pick<RetryPolicy, "maxRetries" | "delayMs">;
  private readonly interCallDelayMs: number;
  private readonly expiryWindowDays: number;
  private readonly fallbackExpiryCount: number;
  private readonly quotes: Map<string, CachedQuote> = new Map();
  private readonly saveStockInfo: (info: StockInfo) => Promise<void>;

  constructor(options: BigOptionsProcessorOptions) {
    this.market = options.market;
    this.client = options.client;
    this.store = options.store;
    this.notifications = options.notifications;
    this.clock = options.clock ?? systemClock;
    this.apiRetry = options.apiRetry ?? API_RETRY;
    this.interCallDelayMs = options.interCallDelayMs ?? INTER_CALL_DELAY_MS;
    this.expiryWindowDays = options.expiryWindowDays ?? 30;
    this.fallbackExpiryCount = options.fallbackExpiryCount ?? 3;
    this.classifier = new BigTradeClassifier(this.market.market, options.thresholds);
    this.notificationLog = new NotificationLog(options.notifyCooldownMs ?? 0);
    this.tracker = new DeltaTracker({
      market: this.market.market,
      store: this.store,
      tradingDay: () => this.tradingDay(),
    });
    this.saveStockInfo = withRetry((info: StockInfo) => this.store.saveStockInfo(info), {
      ...OPERATION_RETRY,
      label: `[${this.market.market}] save stock info`,
      clock: this.clock,
    });
  }

  get marketId(): MarketId {
    return this.market.market;
  }

  /** Options currently tracked for today's deltas */
  get trackedOptions(): number {
    return this.tracker.size;
  }

  tradingDay(): string {
    return tradingDayKey(this.market.schedule, new Date(this.clock.now()));
  }

  async scan(options: ScanOptions): Promise<ScanResult> {
    const id = this.market.market;
    const startedAt = this.clock.now();
    const result: ScanResult = {
      market: id,
      underlyings: 0,
      optionsSeen: 0,
      saved: 0,
      bigTrades: 0,
      notified: 0,
      failedUnderlyings: [],
      durationMs: 0,
    };

    console.log(`🔍 [${id}] Scanning ${this.market.stocks.length} underlying(s)...`);
    const quotes = await this.getUnderlyingQuotes(options.signal);
    const candidates: TradeEvent[] = [];

    for (const stock of this.market.stocks) {
      if (options.signal?.aborted) break;

      const quote = quotes.get(stock.code);
      if (!quote || quote.price <= 0) {
        console.warn(`⚠️ [${id}] No price for ${stock.code}, skipping`);
        result.failedUnderlyings.push(stock.code);
        continue;
      }

      try {
        const codes = await this.collectOptionCodes(stock.code, quote.price, options.signal);
        if (codes.length === 0) {
          console.log(`   [${id}] ${stock.code}: no options in strike window`);
          result.underlyings++;
          continue;
        }

        const rows = await this.fetchSnapshots(codes, options.signal);
        for (const row of rows) {
          const event = await this.processRow(row, stock.code, quote);
          if (!event) continue;
          result.optionsSeen++;
          if (await this.persist(event)) result.saved++;
          if (event.isBigTrade) {
            result.bigTrades++;
            candidates.push(event);
          }
        }
        result.underlyings++;
      } catch (error) {
        console.error(`❌ [${id}] ${stock.code} failed: ${describe(error)}`);
        result.failedUnderlyings.push(stock.code);
      }

      await this.clock.sleep(this.interCallDelayMs, options.signal);
    }

    result.notified = await this.notifyBigTrades(candidates, options.tradingSession);
    result.durationMs = this.clock.now() - startedAt;

    console.log(
      `✅ [${id}] Scan done: ${result.optionsSeen} option(s), ${result.saved} saved, ` +
        `${result.bigTrades} big, ${result.notified} notified` +
        (result.failedUnderlyings.length > 0 ? `, failed: ${result.failedUnderlyings.join(", ")}` : "")
    );
    return result;
  }

  /**
   * Underlying prices and names, cached for QUOTE_CACHE_TTL_MS. Falls back
   * to stale cache entries, then to the configured default price.
   */
  async getUnderlyingQuotes(signal?: AbortSignal): Promise<Map<string, UnderlyingQuote>> {
    const id = this.market.market;
    const now = this.clock.now();
    const codes = this.market.stocks.map((stock) => stock.code);
    const stale = codes.filter((code) => {
      const cached = this.quotes.get(code);
      return !cached || now - cached.fetchedAt >= QUOTE_CACHE_TTL_MS;
    });

    if (stale.length > 0) {
      try {
        const rows = await invokeWithRetry((batch: string[]) => this.client.getMarketSnapshot(batch), [stale], {
          ...this.apiRetry,
          label: `[${id}] underlying snapshot`,
          clock: this.clock,
          signal,
        });
        for (const row of rows) {
          const code = toStr(row.code);
          const price = toFloat(row.last_price);
          if (!code || price <= 0) continue;
          const configured = this.market.stocks.find((stock) => stock.code === code);
          const name = toStr(row.name) || configured?.name || code;
          this.quotes.set(code, { price, name, fetchedAt: now });
          await this.saveStockInfo({ code, market: id, name, lastPrice: price }).catch((error: unknown) => {
            console.error(`❌ [${id}] Failed to save stock info for ${code}: ${describe(error)}`);
          });
        }
      } catch (error) {
        console.error(`❌ [${id}] Underlying quotes unavailable, using cached/default prices: ${describe(error)}`);
      }
    }

    const quotes: Map<string, UnderlyingQuote> = new Map();
    for (const stock of this.market.stocks) {
      const cached = this.quotes.get(stock.code);
      if (cached) {
        quotes.set(stock.code, { price: cached.price, name: cached.name });
      } else if (stock.defaultPrice) {
        console.log(`   [${id}] ${stock.code}: using default price ${stock.defaultPrice}`);
        quotes.set(stock.code, { price: stock.defaultPrice, name: stock.name || stock.code });
      }
    }
    return quotes;
  }

  /**
   * Option codes near the underlying price for the expiries in scope
   */
  async collectOptionCodes(underlyingCode: string, underlyingPrice: number, signal?: AbortSignal): Promise<string[]> {
    const id = this.market.market;
    const expiryRows = await invokeWithRetry((code: string) => this.client.getExpirationDates(code), [underlyingCode], {
      ...this.apiRetry,
      label: `[${id}] ${underlyingCode} expirations`,
      clock: this.clock,
      signal,
    });

    const dates = expiryRows.map((row) => toIsoDate(row.strike_time)).filter((date): date is string => date !== null);
    const expiries = selectExpiries(dates, this.tradingDay(), this.expiryWindowDays, this.fallbackExpiryCount);
    const rule = this.classifier.ruleFor(underlyingCode);
    console.log(
      `   [${id}] ${underlyingCode}: ${expiries.length}/${dates.length} expiries, price ${underlyingPrice}, range ±${(rule.strikeRangeFraction * 100).toFixed(0)}%`
    );

    const codes: Set<string> = new Set();
    for (const expiry of expiries) {
      if (signal?.aborted) break;
      await this.clock.sleep(this.interCallDelayMs, signal);

      let chainRows: RawRow[];
      try {
        chainRows = await invokeWithRetry(
          (code: string, start: string, end: string) => this.client.getOptionChain(code, { start, end }, "ALL"),
          [underlyingCode, expiry, expiry],
          { ...this.apiRetry, label: `[${id}] ${underlyingCode} chain ${expiry}`, clock: this.clock, signal }
        );
      } catch (error) {
        console.warn(`⚠️ [${id}] ${underlyingCode} chain ${expiry} unavailable, skipping expiry: ${describe(error)}`);
        continue;
      }

      const chain: ChainEntry[] = chainRows
        .map((row) => ({ code: toStr(row.code), strikePrice: toFloat(row.strike_price) }))
        .filter((entry) => entry.code !== "");
      const selection = selectStrikes(chain, underlyingPrice, rule.strikeRangeFraction);
      if (selection.widened) {
        console.log(
          `   [${id}] ${underlyingCode} ${expiry}: no strikes in window, widened to ${selection.window.lower.toFixed(2)}-${selection.window.upper.toFixed(2)} (${selection.codes.length} kept)`
        );
      }
      selection.codes.forEach((code) => codes.add(code));
    }

    return [...codes];
  }

  private async fetchSnapshots(codes: string[], signal?: AbortSignal): Promise<RawRow[]> {
    const id = this.market.market;
    const rows: RawRow[] = [];
    for (let i = 0; i < codes.length; i += SNAPSHOT_BATCH_SIZE) {
      if (i > 0) await this.clock.sleep(this.interCallDelayMs, signal);
      const batch = codes.slice(i, i + SNAPSHOT_BATCH_SIZE);
      const batchRows = await invokeWithRetry((list: string[]) => this.client.getMarketSnapshot(list), [batch], {
        ...this.apiRetry,
        label: `[${id}] option snapshot ${i / SNAPSHOT_BATCH_SIZE + 1}`,
        clock: this.clock,
        signal,
      });
      rows.push(...batchRows);
    }
    return rows;
  }

  /**
   * Build the trade event for one snapshot row. Null for rows without a
   * code or without volume.
   */
  async processRow(row: RawRow, underlyingCode: string, quote: UnderlyingQuote): Promise<TradeEvent | null> {
    const now = new Date(this.clock.now());
    const snapshot = toOptionSnapshot(row, underlyingCode, now);
    if (!snapshot.optionCode || snapshot.volume <= 0) return null;

    const parsed = parseOptionCode(snapshot.optionCode);
    const strikePrice = snapshot.apiStrikePrice > 0 ? snapshot.apiStrikePrice : parsed.strikePrice;
    const optionClass = toOptionClass(snapshot.apiOptionType) ?? parsed.optionClass;

    const previousVolume = await this.tracker.getPreviousVolume(snapshot.optionCode, snapshot.volume);
    const [previousOpenInterest, previousNetOpenInterest] = await this.tracker.getPreviousOpenInterest(snapshot.optionCode);
    const volumeDelta = snapshot.volume - previousVolume;

    const priceDiff = strikePrice > 0 && quote.price > 0 ? strikePrice - quote.price : 0;
    const priceDiffPct = quote.price > 0 ? (priceDiff / quote.price) * 100 : 0;

    const isBigTrade = this.classifier.classify({
      underlyingCode,
      volume: snapshot.volume,
      turnover: snapshot.turnover,
      volumeDelta,
    });

    const event: TradeEvent = {
      ...snapshot,
      market: this.market.market,
      tradingDay: this.tradingDay(),
      underlyingName: quote.name,
      underlyingPrice: quote.price,
      strikePrice,
      optionClass,
      expiryDate: parsed.expiryDate,
      priceDiff,
      priceDiffPct,
      previousVolume,
      volumeDelta,
      openInterestDelta: snapshot.openInterest - previousOpenInterest,
      netOpenInterestDelta: snapshot.netOpenInterest - previousNetOpenInterest,
      isBigTrade,
      detectedAt: now.toISOString(),
    };

    this.tracker.recordCurrent(snapshot.optionCode, {
      volume: snapshot.volume,
      openInterest: snapshot.openInterest,
      netOpenInterest: snapshot.netOpenInterest,
    });

    return event;
  }

  private async persist(event: TradeEvent): Promise<boolean> {
    try {
      await this.store.saveTrade(event);
      return true;
    } catch (error) {
      console.error(`❌ [${this.market.market}] Failed to save ${event.optionCode}: ${describe(error)}`);
      return false;
    }
  }

  private async notifyBigTrades(candidates: TradeEvent[], tradingSession: boolean): Promise<number> {
    const now = this.clock.now();
    const fresh = candidates
      .filter((event) => this.notificationLog.shouldNotify(event, now))
      .sort((a, b) => b.turnover - a.turnover);
    if (fresh.length === 0) return 0;

    const message = formatSummaryReport(fresh, {
      market: this.market.market,
      timezone: this.market.schedule.timezone,
      now: new Date(now),
    });
    await this.notifications.notify(message, { market: this.market.market, tradingSession });
    return fresh.length;
  }
}
