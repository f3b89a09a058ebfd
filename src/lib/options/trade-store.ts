/**
 * Trade Store
 *
 * Persistence for observed option quotes and underlying info. The delta
 * tracker reads previous counters back from here when it first meets an
 * instrument on a trading day.
 */

import type { Queryable } from "../db.js";
import { toInt } from "./coerce.js";
import type { MarketId, TradeEvent } from "./types.js";

export interface OpenInterestPair {
  openInterest: number;
  netOpenInterest: number;
}

export interface StockInfo {
  code: string;
  market: MarketId;
  name: string;
  lastPrice: number;
}

export interface TradeStore {
  saveTrade(trade: TradeEvent): Promise<void>;
  /** Highest volume recorded for the code on the trading day, null when none */
  getPreviousVolume(optionCode: string, tradingDay: string): Promise<number | null>;
  /** Most recent open interest pair recorded for the code on the trading day */
  getPreviousOpenInterest(optionCode: string, tradingDay: string): Promise<OpenInterestPair | null>;
  /** Highest volume per code for the whole market on the trading day */
  getTodayVolumes(market: MarketId, tradingDay: string): Promise<Map<string, number>>;
  saveStockInfo(info: StockInfo): Promise<void>;
}

/** Number of columns in the option_trades INSERT statement */
export const TRADE_COLUMNS = 24;

/**
 * Build placeholder string for parameterized query
 * @param offset - Number of parameters already used
 * @param count - Number of columns
 */
export function buildPlaceholder(offset: number, count: number): string {
  const parts: string[] = [];
  for (let i = 1; i <= count; i++) {
    parts.push(`$${offset + i}`);
  }
  return `(${parts.join(", ")})`;
}

export const INSERT_TRADE_SQL = `
  INSERT INTO option_trades (
    market, trading_day, option_code, underlying_code, underlying_name, underlying_price,
    strike_price, option_class, expiry_date,
    last_price, volume, turnover, change_rate, open_interest, net_open_interest,
    previous_volume, volume_delta, open_interest_delta, net_open_interest_delta,
    price_diff, price_diff_pct, is_big_trade, update_time, detected_at
  )
  VALUES ${buildPlaceholder(0, TRADE_COLUMNS)}
`;

export function buildTradeRowValues(trade: TradeEvent): (string | number | boolean | null)[] {
  return [
    trade.market,
    trade.tradingDay,
    trade.optionCode,
    trade.underlyingCode,
    trade.underlyingName || null,
    trade.underlyingPrice,
    trade.strikePrice,
    trade.optionClass,
    trade.expiryDate || null,
    trade.lastPrice,
    trade.volume,
    trade.turnover,
    trade.changeRate,
    trade.openInterest,
    trade.netOpenInterest,
    trade.previousVolume,
    trade.volumeDelta,
    trade.openInterestDelta,
    trade.netOpenInterestDelta,
    trade.priceDiff,
    trade.priceDiffPct,
    trade.isBigTrade,
    trade.updateTime || null,
    trade.detectedAt,
  ];
}

/**
 * PostgreSQL-backed store
 */
export class PgTradeStore implements TradeStore {
  constructor(private readonly db: Queryable) {}

  async saveTrade(trade: TradeEvent): Promise<void> {
    await this.db.query(INSERT_TRADE_SQL, buildTradeRowValues(trade));
  }

  async getPreviousVolume(optionCode: string, tradingDay: string): Promise<number | null> {
    const result = await this.db.query(
      `SELECT MAX(volume) AS volume FROM option_trades WHERE option_code = $1 AND trading_day = $2`,
      [optionCode, tradingDay]
    );
    const row = result.rows[0];
    if (!row || row.volume === null || row.volume === undefined) return null;
    return toInt(row.volume);
  }

  async getPreviousOpenInterest(optionCode: string, tradingDay: string): Promise<OpenInterestPair | null> {
    const result = await this.db.query(
      `SELECT open_interest, net_open_interest FROM option_trades
       WHERE option_code = $1 AND trading_day = $2
       ORDER BY detected_at DESC, id DESC
       LIMIT 1`,
      [optionCode, tradingDay]
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      openInterest: toInt(row.open_interest),
      netOpenInterest: toInt(row.net_open_interest),
    };
  }

  async getTodayVolumes(market: MarketId, tradingDay: string): Promise<Map<string, number>> {
    const result = await this.db.query(
      `SELECT option_code, MAX(volume) AS volume FROM option_trades
       WHERE market = $1 AND trading_day = $2
       GROUP BY option_code`,
      [market, tradingDay]
    );
    const volumes = new Map<string, number>();
    for (const row of result.rows) {
      if (typeof row.option_code === "string") {
        volumes.set(row.option_code, toInt(row.volume));
      }
    }
    return volumes;
  }

  async saveStockInfo(info: StockInfo): Promise<void> {
    await this.db.query(
      `INSERT INTO stock_info (code, market, name, last_price, updated_at)
       VALUES ($1, $2, $3, $4, NOW())
       ON CONFLICT (code) DO UPDATE SET
         market = EXCLUDED.market,
         name = COALESCE(NULLIF(EXCLUDED.name, ''), stock_info.name),
         last_price = EXCLUDED.last_price,
         updated_at = NOW()`,
      [info.code, info.market, info.name, info.lastPrice]
    );
  }
}
