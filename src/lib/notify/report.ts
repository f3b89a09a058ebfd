/**
 * Big-trade summary report
 *
 * One message per scan: totals, then underlyings by turnover with their
 * three largest options.
 */

import { formatLocalTimestamp } from "../market-hours.js";
import type { MarketId, TradeEvent } from "../options/types.js";

export const MARKET_CURRENCY: Record<MarketId, string> = {
  HK: "HKD",
  US: "USD",
};

/** Trades at or above this turnover are counted separately in the header */
export const LARGE_TURNOVER = 1_000_000;

/** Options listed per underlying */
export const TOP_OPTIONS_PER_UNDERLYING = 3;

export interface ReportOptions {
  market: MarketId;
  /** Time zone used for the report timestamp */
  timezone: string;
  now?: Date;
}

interface UnderlyingGroup {
  code: string;
  name: string;
  price: number;
  turnover: number;
  trades: TradeEvent[];
}

function formatInt(value: number): string {
  return Math.round(value).toLocaleString("en-US");
}

function formatSigned(value: number): string {
  return `${value >= 0 ? "+" : ""}${formatInt(value)}`;
}

function groupByUnderlying(trades: TradeEvent[]): UnderlyingGroup[] {
  const groups: Map<string, UnderlyingGroup> = new Map();
  for (const trade of trades) {
    let group = groups.get(trade.underlyingCode);
    if (!group) {
      group = {
        code: trade.underlyingCode,
        name: trade.underlyingName || trade.underlyingCode,
        price: trade.underlyingPrice,
        turnover: 0,
        trades: [],
      };
      groups.set(trade.underlyingCode, group);
    }
    group.turnover += trade.turnover;
    group.trades.push(trade);
  }
  return [...groups.values()].sort((a, b) => b.turnover - a.turnover);
}

/**
 * Detail line for one option, e.g.
 * "  1. HK.TCH250919C650000: Call, 1.500×1,200, +200, 180.0万, OI: 5,000 (+300), net OI: 1,200 (-50)"
 */
export function formatOptionLine(index: number, trade: TradeEvent): string {
  return (
    `  ${index}. ${trade.optionCode}: ${trade.optionClass}, ` +
    `${trade.lastPrice.toFixed(3)}×${formatInt(trade.volume)}, +${formatInt(trade.volumeDelta)}, ` +
    `${(trade.turnover / 10_000).toFixed(1)}万, ` +
    `OI: ${formatInt(trade.openInterest)} (${formatSigned(trade.openInterestDelta)}), ` +
    `net OI: ${formatInt(trade.netOpenInterest)} (${formatSigned(trade.netOpenInterestDelta)})`
  );
}

export function formatSummaryReport(trades: TradeEvent[], options: ReportOptions): string {
  const currency = MARKET_CURRENCY[options.market];
  const now = options.now ?? new Date();

  const totalTurnover = trades.reduce((sum, trade) => sum + trade.turnover, 0);
  const large = trades.filter((trade) => trade.turnover >= LARGE_TURNOVER);
  const largeTurnover = large.reduce((sum, trade) => sum + trade.turnover, 0);

  const lines = [
    `📊 Options big-trade summary [${options.market}]`,
    `⏰ Time: ${formatLocalTimestamp(now, options.timezone)}`,
    `📈 Trades: ${trades.length} (≥${formatInt(LARGE_TURNOVER)}: ${large.length})`,
    `💰 Turnover: ${formatInt(totalTurnover)} ${currency} (≥${formatInt(LARGE_TURNOVER)}: ${formatInt(largeTurnover)} ${currency})`,
    "",
    "📋 By underlying:",
  ];

  for (const group of groupByUnderlying(trades)) {
    const price = group.price > 0 ? ` (price: ${group.price.toFixed(2)})` : "";
    lines.push(
      `• ${group.name} (${group.code}): ${group.trades.length} trade(s), ${formatInt(group.turnover)} ${currency}${price}`
    );

    const top = [...group.trades].sort((a, b) => b.turnover - a.turnover).slice(0, TOP_OPTIONS_PER_UNDERLYING);
    top.forEach((trade, i) => lines.push(formatOptionLine(i + 1, trade)));
  }

  return lines.join("\n");
}
