import "dotenv/config";
import express from "express";
import cors from "cors";
import { pool } from "./lib/db.js";
import { ConfigError, loadConfig, type MonitorConfig } from "./lib/config.js";
import { HttpMarketDataClient } from "./lib/gateway/http-client.js";
import { ConsoleNotifier, NotificationService, type Notifier } from "./lib/notify/notifier.js";
import { WebhookNotifier } from "./lib/notify/webhook.js";
import { PgTradeStore } from "./lib/options/trade-store.js";
import { MultiMarketMonitor } from "./monitor/multi-market-monitor.js";
import { createHealthHandler } from "./api/health/v1.js";
import { createStatusHandler } from "./api/status/v1.js";

function createMonitor(config: MonitorConfig): MultiMarketMonitor {
  const notifiers: Notifier[] = [new ConsoleNotifier()];
  if (config.webhookUrl) {
    notifiers.push(new WebhookNotifier({ url: config.webhookUrl, extraUrls: config.extraWebhookUrls }));
  } else {
    console.log("ℹ️ WEBHOOK_URL not set, big trades go to the console only");
  }

  return new MultiMarketMonitor({
    config,
    client: new HttpMarketDataClient(config.marketDataUrl, config.marketDataToken),
    store: new PgTradeStore(pool),
    notifications: new NotificationService(notifiers),
  });
}

let config: MonitorConfig;
let monitor: MultiMarketMonitor;
try {
  config = loadConfig();
  monitor = createMonitor(config);
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error("❌ Failed to start monitor:", error);
  }
  await pool.end();
  process.exit(1);
}

const app = express();
const port = config.port;

app.use(cors());
app.use(express.json());

app.get("/health", createHealthHandler({ db: pool, getMonitorStatus: () => monitor.getStatus() }));
app.get("/status", createStatusHandler(() => monitor.getStatus()));

/**
 * Start Server
 */
app.listen(port, "::", () => {
  console.log(`🚀 Options monitor API running on port ${port}`);
  console.log(`   Health: http://localhost:${port}/health`);
  console.log(`   Status: http://localhost:${port}/status`);
});

monitor.start();

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully...`);
  await monitor.stop();
  await pool.end();
  process.exit(0);
}

// Graceful shutdown
process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
