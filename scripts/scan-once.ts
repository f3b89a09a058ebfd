#!/usr/bin/env npx tsx
/**
 * Run a single scan pass for one market and print the result
 *
 * Usage:
 *   npx tsx scripts/scan-once.ts HK
 *   npx tsx scripts/scan-once.ts US --no-save
 *
 * Options:
 *   --no-save  Use an in-memory store instead of PostgreSQL.
 */

import "dotenv/config";
import { pool } from "../src/lib/db.js";
import { loadConfig } from "../src/lib/config.js";
import { HttpMarketDataClient } from "../src/lib/gateway/http-client.js";
import { isTradingTime } from "../src/lib/market-hours.js";
import { ConsoleNotifier, NotificationService } from "../src/lib/notify/notifier.js";
import { PgTradeStore, type TradeStore } from "../src/lib/options/trade-store.js";
import { MARKET_IDS, type MarketId } from "../src/lib/options/types.js";
import { BigOptionsProcessor } from "../src/monitor/big-options-processor.js";

const NO_SAVE = process.argv.includes("--no-save");

function parseMarket(arg: string | undefined): MarketId | null {
  const upper = (arg ?? "HK").toUpperCase();
  return MARKET_IDS.find((market) => market === upper) ?? null;
}

/** Keeps volumes for this run only */
function createMemoryStore(): TradeStore {
  const volumes: Map<string, number> = new Map();
  return {
    async saveTrade(trade) {
      volumes.set(trade.optionCode, Math.max(volumes.get(trade.optionCode) ?? 0, trade.volume));
    },
    async getPreviousVolume(optionCode) {
      return volumes.get(optionCode) ?? null;
    },
    async getPreviousOpenInterest() {
      return null;
    },
    async getTodayVolumes() {
      return new Map(volumes);
    },
    async saveStockInfo() {},
  };
}

async function main(): Promise<void> {
  const market = parseMarket(process.argv.slice(2).find((arg) => !arg.startsWith("--")));
  if (!market) {
    console.error(`Unknown market. Expected one of: ${MARKET_IDS.join(", ")}`);
    process.exit(1);
  }

  const config = loadConfig();
  const marketConfig = config.markets[market];
  if (marketConfig.stocks.length === 0) {
    console.error(`No underlyings configured for ${market}`);
    process.exit(1);
  }

  const processor = new BigOptionsProcessor({
    market: marketConfig,
    client: new HttpMarketDataClient(config.marketDataUrl, config.marketDataToken),
    store: NO_SAVE ? createMemoryStore() : new PgTradeStore(pool),
    notifications: new NotificationService([new ConsoleNotifier()]),
    thresholds: config.thresholds,
    expiryWindowDays: config.expiryWindowDays,
    fallbackExpiryCount: config.fallbackExpiryCount,
  });

  const result = await processor.scan({ tradingSession: isTradingTime(marketConfig.schedule) });
  console.log(JSON.stringify(result, null, 2));

  await pool.end();
}

main().catch(async (err) => {
  console.error(err);
  await pool.end();
  process.exit(1);
});
