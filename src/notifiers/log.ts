import type { Deal, NotificationSink } from "../services/types.js";
import { formatDealMessage } from "../utils/formatting.js";

/** Fallback sink when no messaging credentials are configured: writes the alert to stderr. */
export class LogSink implements NotificationSink {
  readonly name = "log";

  async send(deal: Deal): Promise<void> {
    console.error(`[deal]\n${formatDealMessage(deal)}`);
  }
}
