/**
 * HTTP Quote Gateway Client
 *
 * Talks to the quote gateway's JSON API. Every endpoint answers with
 * { ret_code, ret_msg, data: [...] }; ret_code 0 means success.
 *
 * Transport failures (network error, timeout, non-2xx HTTP status) are
 * reported as RET_ERROR responses rather than thrown, so the retrying
 * invoker treats them like any other non-success status.
 */

import type { RawRow } from "../options/coerce.js";
import { RET_ERROR, type ApiResponse, type DateRange, type MarketDataClient, type OptionClassFilter } from "./types.js";

/** Per-request timeout */
const REQUEST_TIMEOUT_MS = 15_000;

interface GatewayEnvelope {
  ret_code?: unknown;
  ret_msg?: unknown;
  data?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a gateway envelope into an ApiResponse
 */
export function parseEnvelope(body: unknown): ApiResponse<RawRow> {
  if (!isRecord(body)) {
    return { status: RET_ERROR, message: "Malformed gateway response", rows: [] };
  }
  const envelope: GatewayEnvelope = body;
  const status = typeof envelope.ret_code === "number" ? envelope.ret_code : RET_ERROR;
  const message = typeof envelope.ret_msg === "string" && envelope.ret_msg ? envelope.ret_msg : undefined;
  const rows = Array.isArray(envelope.data) ? envelope.data.filter(isRecord) : [];
  return { status, message, rows };
}

export class HttpMarketDataClient implements MarketDataClient {
  constructor(
    private readonly baseUrl: string,
    private readonly token?: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  getMarketSnapshot(codes: string[]): Promise<ApiResponse<RawRow>> {
    return this.post("/snapshot", { codes });
  }

  getExpirationDates(underlyingCode: string): Promise<ApiResponse<RawRow>> {
    return this.post("/expirations", { code: underlyingCode });
  }

  getOptionChain(underlyingCode: string, range: DateRange, classFilter: OptionClassFilter): Promise<ApiResponse<RawRow>> {
    return this.post("/option-chain", {
      code: underlyingCode,
      start: range.start,
      end: range.end,
      option_type: classFilter,
    });
  }

  private async post(path: string, body: Record<string, unknown>): Promise<ApiResponse<RawRow>> {
    const url = `${this.baseUrl.replace(/\/$/, "")}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (this.token) headers.Authorization = `Bearer ${this.token}`;

      const response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        return { status: RET_ERROR, message: `HTTP ${response.status}: ${text.slice(0, 200)}`, rows: [] };
      }

      const json: unknown = await response.json();
      return parseEnvelope(json);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return { status: RET_ERROR, message: `Request timeout after ${REQUEST_TIMEOUT_MS}ms (${path})`, rows: [] };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { status: RET_ERROR, message, rows: [] };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
