/**
 * Group-chat webhook notifier
 *
 * Posts { msgtype: "text", text: { content } }. The primary webhook gets
 * every message; extra webhooks only get messages sent during trading
 * sessions.
 */

import { NotificationError, type Notifier, type NotifyContext } from "./notifier.js";

export interface WebhookPayload {
  msgtype: "text";
  text: {
    content: string;
    mentioned_list?: string[];
  };
}

export interface WebhookNotifierOptions {
  url: string;
  extraUrls?: string[];
  mentionedList?: string[];
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export function buildWebhookPayload(content: string, mentionedList: string[] = []): WebhookPayload {
  return {
    msgtype: "text",
    text: mentionedList.length > 0 ? { content, mentioned_list: mentionedList } : { content },
  };
}

export class WebhookNotifier implements Notifier {
  readonly name = "webhook";

  private readonly url: string;
  private readonly extraUrls: string[];
  private readonly mentionedList: string[];
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.extraUrls = options.extraUrls ?? [];
    this.mentionedList = options.mentionedList ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(message: string, context: NotifyContext): Promise<void> {
    const payload = buildWebhookPayload(message, this.mentionedList);

    await this.post(this.url, payload);
    console.log(`[Webhook] [${context.market}] Summary sent`);

    if (this.extraUrls.length === 0) return;
    if (!context.tradingSession) {
      console.log(`[Webhook] [${context.market}] Outside trading hours, skipping ${this.extraUrls.length} extra webhook(s)`);
      return;
    }

    for (const extraUrl of this.extraUrls) {
      try {
        await this.post(extraUrl, payload);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Webhook] [${context.market}] Extra webhook failed: ${reason}`);
      }
    }
  }

  private async post(url: string, payload: WebhookPayload): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new NotificationError(`Request timeout after ${this.timeoutMs}ms`, this.name);
      }
      throw new NotificationError(error instanceof Error ? error.message : String(error), this.name);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new NotificationError(`HTTP ${response.status}`, this.name);
    }

    const body: unknown = await response.json().catch(() => null);
    if (typeof body === "object" && body !== null && "errcode" in body && body.errcode !== 0) {
      const errmsg = "errmsg" in body ? String(body.errmsg) : "unknown error";
      throw new NotificationError(`Webhook rejected message (errcode ${String(body.errcode)}): ${errmsg}`, this.name);
    }
  }
}
