import { describe, expect, it } from "vitest";
import { toFloat, toInt, toOptionSnapshot, toStr } from "../coerce.js";

describe("toInt", () => {
  it("truncates numeric strings toward zero", () => {
    expect(toInt("12.9")).toBe(12);
    expect(toInt("-3.7")).toBe(-3);
    expect(toInt(42)).toBe(42);
  });

  it("returns the fallback for sentinels and junk", () => {
    expect(toInt(null)).toBe(0);
    expect(toInt(undefined)).toBe(0);
    expect(toInt("")).toBe(0);
    expect(toInt("N/A")).toBe(0);
    expect(toInt("abc", 7)).toBe(7);
    expect(toInt(Number.NaN, -1)).toBe(-1);
    expect(toInt(Infinity)).toBe(0);
    expect(toInt(true)).toBe(0);
    expect(toInt({ value: 1 })).toBe(0);
  });
});

describe("toFloat", () => {
  it("parses numbers and trims whitespace", () => {
    expect(toFloat(" 1.25 ")).toBe(1.25);
    expect(toFloat(3)).toBe(3);
  });

  it("returns the fallback for sentinels", () => {
    expect(toFloat("N/A", 1.5)).toBe(1.5);
    expect(toFloat("--")).toBe(0);
    expect(toFloat("NaN")).toBe(0);
  });
});

describe("toStr", () => {
  it("stringifies primitives", () => {
    expect(toStr(12)).toBe("12");
    expect(toStr("x")).toBe("x");
    expect(toStr(false)).toBe("false");
  });

  it("returns the fallback for null, undefined and objects", () => {
    expect(toStr(null, "-")).toBe("-");
    expect(toStr(undefined)).toBe("");
    expect(toStr({ a: 1 }, "?")).toBe("?");
  });
});

describe("toOptionSnapshot", () => {
  it("maps a gateway row", () => {
    const snapshot = toOptionSnapshot(
      {
        code: "US.AAPL250926C155000",
        last_price: "2.35",
        volume: "1200",
        turnover: 282000,
        change_rate: "N/A",
        option_open_interest: "5400",
        option_net_open_interest: -120,
        update_time: "2025-09-19 10:15:00",
        option_strike_price: "155",
        option_type: "CALL",
      },
      "US.AAPL"
    );

    expect(snapshot).toEqual({
      optionCode: "US.AAPL250926C155000",
      underlyingCode: "US.AAPL",
      lastPrice: 2.35,
      volume: 1200,
      turnover: 282000,
      changeRate: 0,
      openInterest: 5400,
      netOpenInterest: -120,
      updateTime: "2025-09-19 10:15:00",
      apiStrikePrice: 155,
      apiOptionType: "CALL",
    });
  });

  it("falls back to strike_price and the observation time", () => {
    const observedAt = new Date("2025-09-19T02:00:00.000Z");
    const snapshot = toOptionSnapshot({ code: "HK.TCH250929P580000", strike_price: 580 }, "HK.00700", observedAt);

    expect(snapshot.apiStrikePrice).toBe(580);
    expect(snapshot.updateTime).toBe("2025-09-19T02:00:00.000Z");
    expect(snapshot.volume).toBe(0);
    expect(snapshot.apiOptionType).toBe("");
  });
});
