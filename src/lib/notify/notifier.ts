/**
 * Notification fan-out
 *
 * Channels receive the formatted summary. A failing channel is logged and
 * never stops the scan or the other channels.
 */

import type { MarketId } from "../options/types.js";

export interface NotifyContext {
  market: MarketId;
  /** Inside the market's trading sessions */
  tradingSession: boolean;
}

export interface Notifier {
  readonly name: string;
  send(message: string, context: NotifyContext): Promise<void>;
}

export class NotificationError extends Error {
  constructor(
    message: string,
    readonly channel: string
  ) {
    super(message);
    this.name = "NotificationError";
  }
}

/**
 * Prints the summary to stdout
 */
export class ConsoleNotifier implements Notifier {
  readonly name = "console";

  async send(message: string): Promise<void> {
    console.log(`\n${message}\n`);
  }
}

export class NotificationService {
  constructor(private readonly notifiers: Notifier[]) {}

  /**
   * Send to every channel
   * @returns Number of channels that accepted the message
   */
  async notify(message: string, context: NotifyContext): Promise<number> {
    const results = await Promise.allSettled(this.notifiers.map((notifier) => notifier.send(message, context)));

    let delivered = 0;
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        delivered++;
      } else {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.error(`❌ [${context.market}] Notification via ${this.notifiers[i].name} failed: ${reason}`);
      }
    });
    return delivered;
  }

  get channels(): string[] {
    return this.notifiers.map((notifier) => notifier.name);
  }
}
