/**
 * Option Code Utilities
 *
 * Gateway option codes follow a fixed layout per market:
 *
 *   <MARKET>.<TICKER><YYMMDD><C|P><STRIKE x 1000>
 *
 * Examples:
 * - US.AAPL250926C155000 -> AAPL call, 2025-09-26, strike 155
 * - HK.TCH250919C650000  -> TCH call, 2025-09-19, strike 650
 * - US.F251017P012500    -> F put, 2025-10-17, strike 12.5
 */

import type { MarketId, OptionClass, ParsedOptionCode } from "./types.js";

/** Strike numerals encode the strike multiplied by this factor */
export const STRIKE_SCALE = 1000;

/** Default width of the zero-padded strike numeral */
export const STRIKE_WIDTH = 6;

const OPTION_CODE_REGEX = /^(HK|US)\.([A-Z][A-Z0-9]*?)(\d{2})(\d{2})(\d{2})([CP])(\d+)$/;

const INVALID: ParsedOptionCode = {
  underlying: "",
  strikePrice: 0,
  optionClass: "Unknown",
  expiryDate: "",
  isValid: false,
};

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Decode an option code. Never throws: check isValid before using the fields.
 */
export function parseOptionCode(code: string | undefined | null): ParsedOptionCode {
  if (!code) return { ...INVALID };

  const match = code.trim().toUpperCase().match(OPTION_CODE_REGEX);
  if (!match) return { ...INVALID };

  const [, market, ticker, yy, mm, dd, classLetter, strikeNumeral] = match;
  const year = 2000 + Number(yy);
  const month = Number(mm);
  const day = Number(dd);
  if (!isCalendarDate(year, month, day)) return { ...INVALID };

  const optionClass: OptionClass = classLetter === "C" ? "Call" : "Put";

  return {
    underlying: `${market}.${ticker}`,
    strikePrice: Number(strikeNumeral) / STRIKE_SCALE,
    optionClass,
    expiryDate: `${year}-${mm}-${dd}`,
    isValid: true,
  };
}

/**
 * Encode a strike as the zero-padded numeral used in option codes
 * @param strike - Strike price (e.g., 12.5)
 * @param width - Minimum digits (e.g., 6 -> "012500")
 */
export function formatStrikeNumeral(strike: number, width: number = STRIKE_WIDTH): string {
  return String(Math.round(strike * STRIKE_SCALE)).padStart(width, "0");
}

/**
 * Rebuild an option code from its parts
 */
export function encodeOptionCode(parts: {
  market: MarketId;
  ticker: string;
  expiryDate: string;
  optionClass: OptionClass;
  strikePrice: number;
  strikeWidth?: number;
}): string {
  const [year, month, day] = parts.expiryDate.split("-");
  const yymmdd = `${year.slice(-2)}${month}${day}`;
  const classLetter = parts.optionClass === "Call" ? "C" : "P";
  return `${parts.market}.${parts.ticker}${yymmdd}${classLetter}${formatStrikeNumeral(parts.strikePrice, parts.strikeWidth)}`;
}

/**
 * Market prefix of a stock or option code ("HK.00700" -> "HK")
 */
export function marketOfCode(code: string): MarketId | null {
  if (code.startsWith("HK.")) return "HK";
  if (code.startsWith("US.")) return "US";
  return null;
}
