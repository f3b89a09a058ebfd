/**
 * Big Trade Detection Thresholds
 *
 * Per-underlying-class thresholds for detecting unusually large option trades.
 */

import type { FilterKey, MarketId, ThresholdRule, ThresholdTable } from "./types.js";

/** Hang Seng Index options */
export const HSI_CODE = "HK.800000";
/** Hang Seng China Enterprises Index options */
export const HSCEI_CODE = "HK.800700";

/**
 * Default thresholds per filter key. Values in the market's currency
 * (HKD for Hong Kong, USD for US). Overridden by the "thresholds" section
 * of the monitor config file.
 *
 * Index options trade in far larger size than single-stock options, so
 * they get higher floors to keep alerts meaningful.
 */
export const DEFAULT_THRESHOLDS: ThresholdTable = {
  hsi_options: {
    minVolume: 200,
    minTurnover: 2_000_000,
    minVolumeDelta: 100,
    strikeRangeFraction: 0.1,
  },
  hscei_options: {
    minVolume: 200,
    minTurnover: 1_000_000,
    minVolumeDelta: 100,
    strikeRangeFraction: 0.1,
  },
  hk_default: {
    minVolume: 50,
    minTurnover: 500_000,
    minVolumeDelta: 20,
    strikeRangeFraction: 0.2,
  },
  us_default: {
    minVolume: 100,
    minTurnover: 100_000,
    minVolumeDelta: 50,
    strikeRangeFraction: 0.2,
  },
};

/**
 * Get the filter key for an underlying
 * @param underlyingCode - Stock or index code (e.g., "HK.00700", "US.AAPL")
 * @param market - Market the underlying is monitored in
 */
export function getFilterKey(underlyingCode: string, market: MarketId): FilterKey {
  if (underlyingCode === HSI_CODE) return "hsi_options";
  if (underlyingCode === HSCEI_CODE) return "hscei_options";
  if (market === "US") return "us_default";
  return "hk_default";
}

/**
 * Get the threshold rule for an underlying
 */
export function getThresholdRule(
  table: ThresholdTable,
  underlyingCode: string,
  market: MarketId
): ThresholdRule {
  return table[getFilterKey(underlyingCode, market)];
}

/**
 * Overlay partial rules on the defaults
 */
export function mergeThresholds(overrides: Partial<Record<FilterKey, Partial<ThresholdRule>>> = {}): ThresholdTable {
  return {
    hsi_options: { ...DEFAULT_THRESHOLDS.hsi_options, ...overrides.hsi_options },
    hscei_options: { ...DEFAULT_THRESHOLDS.hscei_options, ...overrides.hscei_options },
    hk_default: { ...DEFAULT_THRESHOLDS.hk_default, ...overrides.hk_default },
    us_default: { ...DEFAULT_THRESHOLDS.us_default, ...overrides.us_default },
  };
}
