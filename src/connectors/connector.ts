/** Outbound messaging capability. Either call may reject; the caller decides what a failure means. */
export interface Connector {
  readonly id: string;
  sendText(chatId: string, text: string): Promise<void>;
  sendGif(chatId: string, gifPath: string): Promise<void>;
}
