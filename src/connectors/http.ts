import type { HttpConnectorConfig } from "../config/types.js";
import type { Connector } from "./connector.js";

type OutboundPayload =
  | { type: "text"; chat_id: string; text: string }
  | { type: "gif"; chat_id: string; path: string };

/**
 * Posts outbound messages as JSON to a bridge service that owns the actual
 * chat client. Non-2xx responses reject.
 */
export class HttpConnector implements Connector {
  readonly id = "http";

  constructor(
    private readonly config: HttpConnectorConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async sendText(chatId: string, text: string): Promise<void> {
    await this.post({ type: "text", chat_id: chatId, text });
  }

  async sendGif(chatId: string, gifPath: string): Promise<void> {
    await this.post({ type: "gif", chat_id: chatId, path: gifPath });
  }

  private async post(payload: OutboundPayload): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.token) headers["Authorization"] = `Bearer ${this.config.token}`;

    try {
      const response = await this.fetchImpl(this.config.url, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Connector send failed: ${response.status} ${response.statusText}`);
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
