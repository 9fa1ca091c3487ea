import { DeliveryError, errorMessage } from "../errors.js";
import type { Deal, NotificationSink } from "../services/types.js";
import { formatDealMessage } from "../utils/formatting.js";

const API_BASE = "https://api.telegram.org";

export class TelegramSink implements NotificationSink {
  readonly name = "telegram";
  private readonly botToken: string;
  private readonly chatId: string;

  constructor(botToken: string, chatId: string) {
    this.botToken = botToken;
    this.chatId = chatId;
  }

  isAvailable(): boolean {
    return this.botToken.length > 0 && this.chatId.length > 0;
  }

  async send(deal: Deal): Promise<void> {
    let resp: Response;
    try {
      resp = await fetch(`${API_BASE}/bot${this.botToken}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: formatDealMessage(deal),
          disable_web_page_preview: true,
        }),
      });
    } catch (err) {
      throw new DeliveryError(this.name, errorMessage(err), err);
    }

    if (!resp.ok) {
      const body = await resp.text();
      throw new DeliveryError(this.name, `HTTP ${resp.status} ${body}`);
    }
  }
}
