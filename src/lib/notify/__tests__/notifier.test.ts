import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NotificationService, type Notifier } from "../notifier.js";
import { WebhookNotifier, buildWebhookPayload } from "../webhook.js";
import { RecordingNotifier } from "../../../__tests__/fakes.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("WebhookNotifier", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts a text payload to the primary and extra webhooks during trading", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ errcode: 0, errmsg: "ok" }));
    const notifier = new WebhookNotifier({
      url: "http://hooks.local/primary",
      extraUrls: ["http://hooks.local/extra-1", "http://hooks.local/extra-2"],
      fetchImpl,
    });

    await notifier.send("big trade", { market: "HK", tradingSession: true });

    expect(fetchImpl.mock.calls.map(([url]) => String(url))).toEqual([
      "http://hooks.local/primary",
      "http://hooks.local/extra-1",
      "http://hooks.local/extra-2",
    ]);
    const init = fetchImpl.mock.calls[0][1];
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({ msgtype: "text", text: { content: "big trade" } });
  });

  it("skips extra webhooks outside trading hours", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ errcode: 0 }));
    const notifier = new WebhookNotifier({
      url: "http://hooks.local/primary",
      extraUrls: ["http://hooks.local/extra-1"],
      fetchImpl,
    });

    await notifier.send("after hours", { market: "US", tradingSession: false });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("fails on a non-zero errcode", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ errcode: 93000, errmsg: "invalid webhook url" }));
    const notifier = new WebhookNotifier({ url: "http://hooks.local/primary", fetchImpl });

    await expect(notifier.send("x", { market: "HK", tradingSession: true })).rejects.toThrow(
      "Webhook rejected message (errcode 93000): invalid webhook url"
    );
  });

  it("fails on an HTTP error status", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("bad gateway", { status: 502 }));
    const notifier = new WebhookNotifier({ url: "http://hooks.local/primary", fetchImpl });

    await expect(notifier.send("x", { market: "HK", tradingSession: true })).rejects.toThrow("HTTP 502");
  });

  it("keeps going when an extra webhook fails", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async (input) =>
      String(input).endsWith("extra-1") ? new Response("nope", { status: 500 }) : jsonResponse({ errcode: 0 })
    );
    const notifier = new WebhookNotifier({
      url: "http://hooks.local/primary",
      extraUrls: ["http://hooks.local/extra-1", "http://hooks.local/extra-2"],
      fetchImpl,
    });

    await expect(notifier.send("x", { market: "HK", tradingSession: true })).resolves.toBeUndefined();
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenCalledWith("[Webhook] [HK] Extra webhook failed: HTTP 500");
  });

  it("adds mentions when configured", () => {
    expect(buildWebhookPayload("hi", ["@all"])).toEqual({
      msgtype: "text",
      text: { content: "hi", mentioned_list: ["@all"] },
    });
  });
});

describe("NotificationService", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers to every channel and logs failures", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const recording = new RecordingNotifier();
    const broken: Notifier = {
      name: "broken",
      send: async () => {
        throw new Error("boom");
      },
    };
    const service = new NotificationService([broken, recording]);

    const delivered = await service.notify("summary", { market: "HK", tradingSession: true });

    expect(delivered).toBe(1);
    expect(recording.messages).toEqual([{ message: "summary", context: { market: "HK", tradingSession: true } }]);
    expect(errors).toHaveBeenCalledWith("❌ [HK] Notification via broken failed: boom");
    expect(service.channels).toEqual(["broken", "recording"]);
  });
});
