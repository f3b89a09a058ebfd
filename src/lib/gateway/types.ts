/**
 * Quote gateway contract
 */

import type { RawRow } from "../options/coerce.js";

/** Gateway success status */
export const RET_OK = 0;

/** Status used for transport failures (network, timeout, bad HTTP status) */
export const RET_ERROR = -1;

/**
 * Gateway response. A non-success status is distinct from a thrown error:
 * the gateway answered, but refused or failed the request.
 */
export interface ApiResponse<T> {
  status: number;
  message?: string;
  rows: T[];
}

export type OptionClassFilter = "ALL" | "CALL" | "PUT";

export interface DateRange {
  /** YYYY-MM-DD */
  start: string;
  /** YYYY-MM-DD */
  end: string;
}

export interface MarketDataClient {
  /** Snapshot rows: code, name, last_price, volume, turnover, change_rate, option_* fields, update_time */
  getMarketSnapshot(codes: string[]): Promise<ApiResponse<RawRow>>;
  /** Expiration rows: strike_time (YYYY-MM-DD), option_expiry_date_distance */
  getExpirationDates(underlyingCode: string): Promise<ApiResponse<RawRow>>;
  /** Chain rows: code, strike_price, option_type, strike_time */
  getOptionChain(underlyingCode: string, range: DateRange, classFilter: OptionClassFilter): Promise<ApiResponse<RawRow>>;
}
