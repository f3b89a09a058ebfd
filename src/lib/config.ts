/**
 * Monitor configuration
 *
 * Connection settings and timings come from the environment (loaded by
 * dotenv in the entry points). The universe, trading sessions and
 * threshold overrides come from a JSON file validated with zod.
 */

import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_SCHEDULES, type MarketSchedule } from "./market-hours.js";
import { mergeThresholds } from "./options/thresholds.js";
import { MARKET_IDS, type MarketId, type ThresholdTable } from "./options/types.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const StockSchema = z.object({
  code: z.string().regex(/^(HK|US)\.[A-Z0-9.]+$/, "expected a market-qualified code such as HK.00700"),
  name: z.string().default(""),
  /** Used when the gateway returns no price for the underlying */
  defaultPrice: z.number().positive().optional(),
});

const MarketSchema = z.object({
  stocks: z.array(StockSchema).default([]),
  timezone: z.string().optional(),
  sessions: z.array(z.tuple([z.string().regex(HHMM), z.string().regex(HHMM)])).optional(),
  holidays: z.array(z.string().regex(ISO_DATE)).default([]),
});

const RuleOverrideSchema = z
  .object({
    minVolume: z.number().nonnegative(),
    minTurnover: z.number().nonnegative(),
    minVolumeDelta: z.number().nonnegative(),
    strikeRangeFraction: z.number().positive().max(1),
  })
  .partial();

export const MonitorFileSchema = z.object({
  markets: z
    .object({
      HK: MarketSchema.default({}),
      US: MarketSchema.default({}),
    })
    .default({}),
  thresholds: z
    .object({
      hsi_options: RuleOverrideSchema.optional(),
      hscei_options: RuleOverrideSchema.optional(),
      hk_default: RuleOverrideSchema.optional(),
      us_default: RuleOverrideSchema.optional(),
    })
    .default({}),
  /** Expiries within this many days are scanned */
  expiryWindowDays: z.number().int().positive().default(30),
  /** Expiries scanned when none fall inside the window */
  fallbackExpiryCount: z.number().int().positive().default(3),
});

export type MonitorFile = z.infer<typeof MonitorFileSchema>;
export type StockConfig = z.infer<typeof StockSchema>;

export interface MarketConfig {
  market: MarketId;
  stocks: StockConfig[];
  schedule: MarketSchedule;
  /** Scan outside trading sessions too */
  monitorOffHours: boolean;
}

export interface MonitorConfig {
  markets: Record<MarketId, MarketConfig>;
  thresholds: ThresholdTable;
  expiryWindowDays: number;
  fallbackExpiryCount: number;
  minApiIntervalMs: number;
  singleMarketIntervalMs: number;
  multiMarketIntervalMs: number;
  notifyCooldownMs: number;
  marketDataUrl: string;
  marketDataToken?: string;
  webhookUrl?: string;
  extraWebhookUrls: string[];
  port: number;
}

export type Env = Record<string, string | undefined>;

const REQUIRED_ENV = ["POSTGRES_URL", "MARKET_DATA_URL"] as const;

/**
 * Check required environment variables
 * @returns Error message listing every missing variable, or null
 */
export function validateEnv(env: Env): string | null {
  const missing = REQUIRED_ENV.filter((name) => !env[name]);
  if (missing.length > 0) {
    return `Missing required environment variables: ${missing.join(", ")}`;
  }
  return null;
}

function readSeconds(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback * 1000;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`${name} must be a non-negative number of seconds, got "${raw}"`);
  }
  return seconds * 1000;
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "true" || raw === "1" || raw === "yes";
}

function readList(env: Env, name: string): string[] {
  return (env[name] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseMonitorFile(json: unknown): MonitorFile {
  const result = MonitorFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid monitor config:\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}

export function loadMonitorFile(filePath: string): MonitorFile {
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read monitor config ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Monitor config ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseMonitorFile(json);
}

/**
 * Combine the monitor file and environment into the runtime config
 */
export function buildConfig(file: MonitorFile, env: Env): MonitorConfig {
  const marketConfig = (market: MarketId): MarketConfig => {
    const section = file.markets[market];
    const defaults = DEFAULT_SCHEDULES[market];
    return {
      market,
      stocks: section.stocks,
      schedule: {
        timezone: section.timezone ?? defaults.timezone,
        sessions: section.sessions ?? defaults.sessions,
        holidays: section.holidays,
      },
      monitorOffHours: readFlag(env, `MONITOR_OFF_HOURS_${market}`),
    };
  };

  const port = Number(env.PORT) || 8080;

  return {
    markets: { HK: marketConfig("HK"), US: marketConfig("US") },
    thresholds: mergeThresholds(file.thresholds),
    expiryWindowDays: file.expiryWindowDays,
    fallbackExpiryCount: file.fallbackExpiryCount,
    minApiIntervalMs: readSeconds(env, "MIN_API_INTERVAL_SECONDS", 5),
    singleMarketIntervalMs: readSeconds(env, "SINGLE_MARKET_SCAN_SECONDS", 60),
    multiMarketIntervalMs: readSeconds(env, "MULTI_MARKET_SCAN_SECONDS", 120),
    notifyCooldownMs: readSeconds(env, "NOTIFY_COOLDOWN_SECONDS", 0),
    marketDataUrl: env.MARKET_DATA_URL ?? "",
    marketDataToken: env.MARKET_DATA_TOKEN || undefined,
    webhookUrl: env.WEBHOOK_URL || undefined,
    extraWebhookUrls: readList(env, "EXTRA_WEBHOOK_URLS"),
    port,
  };
}

/**
 * Load and validate everything the monitor needs
 */
export function loadConfig(env: Env = process.env): MonitorConfig {
  const envError = validateEnv(env);
  if (envError) throw new ConfigError(envError);

  const filePath = path.resolve(process.cwd(), env.MONITOR_CONFIG || "config/monitor.json");
  return buildConfig(loadMonitorFile(filePath), env);
}

/**
 * Markets with at least one configured underlying
 */
export function enabledMarkets(config: MonitorConfig): MarketId[] {
  return MARKET_IDS.filter((market) => config.markets[market].stocks.length > 0);
}
