/**
 * Type definitions for option snapshots, delta tracking and big-trade detection
 */

/** Markets served by the quote gateway */
export type MarketId = "HK" | "US";

export const MARKET_IDS: readonly MarketId[] = ["HK", "US"];

export type OptionClass = "Call" | "Put";

/** Result of decoding an option code such as "US.AAPL250926C155000" */
export interface ParsedOptionCode {
  /** Market-qualified underlying ticker (e.g., "US.AAPL"), "" when invalid */
  underlying: string;
  /** Decoded strike price, 0 when invalid */
  strikePrice: number;
  optionClass: OptionClass | "Unknown";
  /** ISO date (YYYY-MM-DD), "" when invalid */
  expiryDate: string;
  isValid: boolean;
}

/**
 * Point-in-time quote for one option, built at the client boundary.
 * All counters are cumulative for the current session.
 */
export interface OptionSnapshot {
  readonly optionCode: string;
  /** Underlying stock or index code (e.g., "HK.00700") */
  readonly underlyingCode: string;
  readonly lastPrice: number;
  readonly volume: number;
  readonly turnover: number;
  readonly changeRate: number;
  readonly openInterest: number;
  readonly netOpenInterest: number;
  /** Gateway update time, as reported */
  readonly updateTime: string;
  /** Strike reported by the gateway (0 when absent) */
  readonly apiStrikePrice: number;
  /** Option type reported by the gateway ("" when absent) */
  readonly apiOptionType: string;
}

/** Per-instrument, per-trading-day previous counters */
export interface VolumeState {
  previousVolume: number;
  previousOpenInterest: number;
  previousNetOpenInterest: number;
}

/** Latest counters for an instrument, handed back to the tracker after a cycle */
export interface VolumeObservation {
  volume: number;
  openInterest: number;
  netOpenInterest: number;
}

/**
 * Option snapshot enriched with per-cycle deltas and resolved contract details
 */
export interface TradeEvent extends OptionSnapshot {
  readonly market: MarketId;
  readonly tradingDay: string;
  readonly underlyingName: string;
  readonly underlyingPrice: number;
  readonly strikePrice: number;
  readonly optionClass: OptionClass | "Unknown";
  readonly expiryDate: string;
  /** strike - underlying price */
  readonly priceDiff: number;
  /** priceDiff as a percentage of the underlying price */
  readonly priceDiffPct: number;
  readonly previousVolume: number;
  readonly volumeDelta: number;
  readonly openInterestDelta: number;
  readonly netOpenInterestDelta: number;
  readonly isBigTrade: boolean;
  readonly detectedAt: string;
}

/**
 * Threshold configuration for one class of underlying
 */
export interface ThresholdRule {
  /** Minimum cumulative session volume (contracts) */
  minVolume: number;
  /** Minimum cumulative session turnover (premium, market currency) */
  minTurnover: number;
  /** Minimum volume added since the previous cycle */
  minVolumeDelta: number;
  /** Strike window around the underlying price, as a fraction (0.2 = ±20%) */
  strikeRangeFraction: number;
}

export type FilterKey = "hsi_options" | "hscei_options" | "hk_default" | "us_default";

export type ThresholdTable = Record<FilterKey, ThresholdRule>;

/** Option chain entry used for strike filtering */
export interface ChainEntry {
  code: string;
  strikePrice: number;
}

/** Underlying quote used for strike windows and reports */
export interface UnderlyingQuote {
  price: number;
  name: string;
}
