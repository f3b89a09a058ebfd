/**
 * Safe Numeric Coercion
 *
 * Gateway rows carry numbers, numeric strings, "N/A" sentinels and blanks
 * in the same columns. Everything downstream works on the typed
 * OptionSnapshot built here.
 */

import type { OptionSnapshot } from "./types.js";

/** Raw row as returned by the quote gateway */
export type RawRow = Record<string, unknown>;

const SENTINELS = new Set(["", "N/A", "n/a", "NaN", "--"]);

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (SENTINELS.has(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Coerce to an integer, truncating toward zero ("12.9" -> 12)
 */
export function toInt(value: unknown, fallback = 0): number {
  const n = toFiniteNumber(value);
  return n === null ? fallback : Math.trunc(n);
}

export function toFloat(value: unknown, fallback = 0): number {
  const n = toFiniteNumber(value);
  return n === null ? fallback : n;
}

export function toStr(value: unknown, fallback = ""): string {
  if (value === null || value === undefined) return fallback;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  return fallback;
}

/**
 * Build an OptionSnapshot from a gateway snapshot row
 *
 * @param row - Raw snapshot row (code, last_price, volume, turnover, ...)
 * @param underlyingCode - Underlying the option was selected for
 * @param observedAt - Used when the row carries no update_time
 */
export function toOptionSnapshot(row: RawRow, underlyingCode: string, observedAt: Date = new Date()): OptionSnapshot {
  return {
    optionCode: toStr(row.code),
    underlyingCode,
    lastPrice: toFloat(row.last_price),
    volume: toInt(row.volume),
    turnover: toFloat(row.turnover),
    changeRate: toFloat(row.change_rate),
    openInterest: toInt(row.option_open_interest),
    netOpenInterest: toInt(row.option_net_open_interest),
    updateTime: toStr(row.update_time, observedAt.toISOString()),
    apiStrikePrice: toFloat(row.option_strike_price) || toFloat(row.strike_price),
    apiOptionType: toStr(row.option_type),
  };
}
