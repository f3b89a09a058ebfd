/**
 * Strike Window Selection
 *
 * Narrows an option chain to strikes near the underlying price. When the
 * configured window is empty the window is widened and only the closest
 * strikes are kept, so an underlying with sparse strikes is still scanned.
 */

import type { ChainEntry } from "./types.js";

/** Factor applied to the strike range when the first window is empty */
export const WIDEN_FACTOR = 1.5;

/** Strikes kept from the widened window */
export const WIDENED_MAX_ENTRIES = 5;

export interface StrikeWindow {
  lower: number;
  upper: number;
}

export interface StrikeSelection {
  codes: string[];
  window: StrikeWindow;
  widened: boolean;
}

export function strikeWindow(underlyingPrice: number, rangeFraction: number): StrikeWindow {
  return {
    lower: underlyingPrice * (1 - rangeFraction),
    upper: underlyingPrice * (1 + rangeFraction),
  };
}

function inWindow(entry: ChainEntry, window: StrikeWindow): boolean {
  return entry.strikePrice >= window.lower && entry.strikePrice <= window.upper;
}

/**
 * Select option codes whose strike lies near the underlying price
 *
 * @param chain - Option chain entries for one expiry
 * @param underlyingPrice - Current underlying price
 * @param rangeFraction - Half-width of the window as a fraction of the price
 */
export function selectStrikes(chain: ChainEntry[], underlyingPrice: number, rangeFraction: number): StrikeSelection {
  const narrow = strikeWindow(underlyingPrice, rangeFraction);
  const inNarrow = chain.filter((entry) => inWindow(entry, narrow));

  if (inNarrow.length > 0) {
    return { codes: inNarrow.map((entry) => entry.code), window: narrow, widened: false };
  }

  const wide = strikeWindow(underlyingPrice, rangeFraction * WIDEN_FACTOR);
  const closest = chain
    .filter((entry) => inWindow(entry, wide))
    .sort((a, b) => Math.abs(a.strikePrice - underlyingPrice) - Math.abs(b.strikePrice - underlyingPrice))
    .slice(0, WIDENED_MAX_ENTRIES);

  return { codes: closest.map((entry) => entry.code), window: wide, widened: true };
}
