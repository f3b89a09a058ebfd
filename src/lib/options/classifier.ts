/**
 * Big-Trade Classifier
 *
 * A snapshot is a big trade only when the session totals are large AND
 * enough volume was added since the previous cycle. A liquid but idle
 * contract fails the delta test; a contract whose only volume was booked
 * before the previous cycle fails it as well.
 */

import { getThresholdRule } from "./thresholds.js";
import type { MarketId, ThresholdRule, ThresholdTable, TradeEvent } from "./types.js";

export interface ClassifiableTrade {
  volume: number;
  turnover: number;
  volumeDelta: number;
}

export function isBigTrade(trade: ClassifiableTrade, rule: ThresholdRule): boolean {
  return (
    trade.volume >= rule.minVolume &&
    trade.turnover >= rule.minTurnover &&
    trade.volumeDelta >= rule.minVolumeDelta
  );
}

/**
 * Classifier bound to one market's threshold table
 */
export class BigTradeClassifier {
  constructor(
    private readonly market: MarketId,
    private readonly thresholds: ThresholdTable
  ) {}

  ruleFor(underlyingCode: string): ThresholdRule {
    return getThresholdRule(this.thresholds, underlyingCode, this.market);
  }

  classify(trade: ClassifiableTrade & { underlyingCode: string }): boolean {
    return isBigTrade(trade, this.ruleFor(trade.underlyingCode));
  }
}

interface NotificationRecord {
  notifiedAt: number;
  volume: number;
}

/**
 * Per-process record of announced big trades.
 *
 * A trade is a duplicate when the same contract was already announced at
 * the same cumulative volume, or was announced less than cooldownMs ago.
 */
export class NotificationLog {
  private readonly records: Map<string, NotificationRecord> = new Map();

  constructor(private readonly cooldownMs: number = 0) {}

  shouldNotify(trade: Pick<TradeEvent, "optionCode" | "volume">, now: number = Date.now()): boolean {
    const previous = this.records.get(trade.optionCode);

    if (previous) {
      if (previous.volume === trade.volume) return false;
      if (this.cooldownMs > 0 && now - previous.notifiedAt < this.cooldownMs) return false;
    }

    this.records.set(trade.optionCode, { notifiedAt: now, volume: trade.volume });
    return true;
  }

  lastNotifiedAt(optionCode: string): number | undefined {
    return this.records.get(optionCode)?.notifiedAt;
  }

  get size(): number {
    return this.records.size;
  }
}
