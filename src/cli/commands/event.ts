import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { SECRET_HEADER, type InboundEvent } from "../../gateway/server.js";

export class EventSendCommand extends Command {
  static override paths = [["event", "send"]];

  static override usage = Command.Usage({
    description: "Post a test inbound event to a running gateway",
    examples: [
      ["Send a direct message", 'nudgebot event send --text "hello"'],
      [
        "Mention the bot in a group",
        'nudgebot event send --chat-id team --chat-type group --mention --text "hi bot"',
      ],
    ],
  });

  url = Option.String("--url", {
    description: "Inbound endpoint URL (defaults to the configured listen address)",
    required: false,
  });

  secret = Option.String("--secret", {
    description: "Shared secret (defaults to the configured one)",
    required: false,
  });

  chatId = Option.String("--chat-id", "demo-chat", { description: "Chat identifier" });
  chatType = Option.String("--chat-type", "direct", { description: "direct or group" });
  senderId = Option.String("--sender-id", "user-1", { description: "Sender identifier" });
  text = Option.String("--text", "hello", { description: "Message text" });
  mention = Option.Boolean("--mention", false, { description: "Mark the bot as mentioned" });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const chatType = this.chatType;
    if (chatType !== "direct" && chatType !== "group") {
      this.context.stdout.write(`Invalid --chat-type: ${chatType} (expected direct or group)\n`);
      process.exitCode = 1;
      return;
    }

    let url = this.url;
    let secret = this.secret;
    if (url === undefined || secret === undefined) {
      const config = loadConfig(this.config);
      url ??= `http://${config.runtime.host}:${config.runtime.port}/events/inbound`;
      secret ??= config.security.sharedSecret;
    }

    const payload: InboundEvent = {
      chat_id: this.chatId,
      chat_type: chatType,
      sender_id: this.senderId,
      timestamp: Math.floor(Date.now() / 1000),
      text: this.text,
      is_mention: this.mention,
    };

    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", [SECRET_HEADER]: secret },
      body: JSON.stringify(payload),
    });

    this.context.stdout.write(`${response.status} ${await response.text()}\n`);
    if (!response.ok) process.exitCode = 1;
  }
}
