import { describe, expect, it } from "vitest";
import type { Queryable } from "../../db.js";
import { INSERT_TRADE_SQL, PgTradeStore, TRADE_COLUMNS, buildPlaceholder, buildTradeRowValues } from "../trade-store.js";
import { makeTradeEvent } from "../../../__tests__/fakes.js";

class FakeDb implements Queryable {
  readonly queries: Array<{ text: string; values?: unknown[] }> = [];

  constructor(private readonly rows: Record<string, unknown>[] = []) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }> {
    this.queries.push({ text, values });
    return { rows: this.rows };
  }
}

describe("buildPlaceholder", () => {
  it("numbers parameters from the offset", () => {
    expect(buildPlaceholder(0, 3)).toBe("($1, $2, $3)");
    expect(buildPlaceholder(3, 2)).toBe("($4, $5)");
  });
});

describe("PgTradeStore", () => {
  it("inserts one value per column", async () => {
    const db = new FakeDb();
    const trade = makeTradeEvent();

    await new PgTradeStore(db).saveTrade(trade);

    expect(db.queries[0].text).toBe(INSERT_TRADE_SQL);
    expect(INSERT_TRADE_SQL).toContain(`$${TRADE_COLUMNS})`);
    expect(db.queries[0].values).toHaveLength(TRADE_COLUMNS);
    expect(buildTradeRowValues(trade).slice(0, 4)).toEqual(["HK", "2025-09-19", "HK.TCH250929C600000", "HK.00700"]);
  });

  it("reads the highest volume as a number", async () => {
    const db = new FakeDb([{ volume: "1500" }]);

    expect(await new PgTradeStore(db).getPreviousVolume("HK.TCH250929C600000", "2025-09-19")).toBe(1500);
    expect(db.queries[0].values).toEqual(["HK.TCH250929C600000", "2025-09-19"]);
  });

  it("returns null when there is no history", async () => {
    const store = new PgTradeStore(new FakeDb([{ volume: null }]));
    expect(await store.getPreviousVolume("HK.TCH250929C600000", "2025-09-19")).toBeNull();

    const empty = new PgTradeStore(new FakeDb([]));
    expect(await empty.getPreviousOpenInterest("HK.TCH250929C600000", "2025-09-19")).toBeNull();
  });

  it("reads open interest and today's volumes", async () => {
    const oiStore = new PgTradeStore(new FakeDb([{ open_interest: "4100", net_open_interest: -20 }]));
    expect(await oiStore.getPreviousOpenInterest("HK.TCH250929C600000", "2025-09-19")).toEqual({
      openInterest: 4100,
      netOpenInterest: -20,
    });

    const volumesStore = new PgTradeStore(
      new FakeDb([
        { option_code: "HK.TCH250929C600000", volume: "900" },
        { option_code: "HK.TCH250929P580000", volume: 40 },
      ])
    );
    const volumes = await volumesStore.getTodayVolumes("HK", "2025-09-19");
    expect([...volumes.entries()]).toEqual([
      ["HK.TCH250929C600000", 900],
      ["HK.TCH250929P580000", 40],
    ]);
  });
});
