/**
 * Market Hours
 *
 * Trading sessions and trading-day keys per market, evaluated in the
 * market's own time zone so daylight saving needs no special handling.
 *
 * Default sessions (local exchange time):
 * - HK: 09:30 - 12:00, 13:00 - 16:00 (Asia/Hong_Kong)
 * - US: 09:30 - 16:00 (America/New_York)
 */

import type { MarketId } from "./options/types.js";

export interface MarketSchedule {
  /** IANA time zone of the exchange */
  timezone: string;
  /** Sessions as [open, close] in HH:MM local time */
  sessions: Array<[string, string]>;
  /** Closed dates (YYYY-MM-DD, exchange calendar) */
  holidays: string[];
}

export const DEFAULT_SCHEDULES: Record<MarketId, MarketSchedule> = {
  HK: {
    timezone: "Asia/Hong_Kong",
    sessions: [
      ["09:30", "12:00"],
      ["13:00", "16:00"],
    ],
    holidays: [],
  },
  US: {
    timezone: "America/New_York",
    sessions: [["09:30", "16:00"]],
    holidays: [],
  },
};

interface LocalTime {
  date: string;
  time: string;
  weekday: number;
  minutes: number;
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

const formatterCache: Map<string, Intl.DateTimeFormat> = new Map();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      weekday: "short",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Wall-clock date, weekday and minute-of-day in a time zone
 */
function toLocalTime(now: Date, timezone: string): LocalTime {
  const parts: Record<string, string> = {};
  for (const part of getFormatter(timezone).formatToParts(now)) {
    parts[part.type] = part.value;
  }
  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    time: `${parts.hour}:${parts.minute}:${parts.second}`,
    weekday: WEEKDAYS[parts.weekday] ?? 0,
    minutes: Number(parts.hour) * 60 + Number(parts.minute),
  };
}

/** "09:30" -> 570 */
export function parseClock(hhmm: string): number {
  const [hours, minutes] = hhmm.split(":").map(Number);
  return hours * 60 + minutes;
}

/**
 * Trading-day key (exchange calendar date, YYYY-MM-DD).
 * Cumulative counters reset when this key changes.
 */
export function tradingDayKey(schedule: MarketSchedule, now: Date = new Date()): string {
  return toLocalTime(now, schedule.timezone).date;
}

/** "YYYY-MM-DD HH:MM:SS" wall-clock time in a time zone */
export function formatLocalTimestamp(now: Date, timezone: string): string {
  const local = toLocalTime(now, timezone);
  return `${local.date} ${local.time}`;
}

export function isTradingDay(schedule: MarketSchedule, now: Date = new Date()): boolean {
  const local = toLocalTime(now, schedule.timezone);
  if (local.weekday === 0 || local.weekday === 6) return false;
  return !schedule.holidays.includes(local.date);
}

/**
 * Check whether the market is inside one of its sessions
 * (open inclusive, close exclusive)
 */
export function isTradingTime(schedule: MarketSchedule, now: Date = new Date()): boolean {
  if (!isTradingDay(schedule, now)) return false;
  const { minutes } = toLocalTime(now, schedule.timezone);
  return schedule.sessions.some(([open, close]) => minutes >= parseClock(open) && minutes < parseClock(close));
}

export type MarketState = "trading" | "monitoring" | "closed";

/**
 * Summarize a market for status logs: trading, off-hours but monitored, or closed
 */
export function describeMarketState(schedule: MarketSchedule, monitorOffHours: boolean, now: Date = new Date()): MarketState {
  if (isTradingTime(schedule, now)) return "trading";
  return monitorOffHours ? "monitoring" : "closed";
}
