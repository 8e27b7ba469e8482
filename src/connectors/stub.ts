import type { Logger } from "../logging/logger.js";
import type { Connector } from "./connector.js";

/** Logs outbound messages instead of delivering them. */
export class StubConnector implements Connector {
  readonly id = "stub";
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ connector: this.id });
  }

  async sendText(chatId: string, text: string): Promise<void> {
    this.logger.info({ chatId, text }, "[stub] send_text");
  }

  async sendGif(chatId: string, gifPath: string): Promise<void> {
    this.logger.info({ chatId, gifPath }, "[stub] send_gif");
  }
}
