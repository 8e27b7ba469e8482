import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { TurnHandler } from "./turn-handler.js";
import { MS_PER_SECOND } from "../utils/time.js";
import { VERSION } from "../version.js";

export const SECRET_HEADER = "X-BOT-SECRET";

export const inboundEventSchema = z.object({
  chat_id: z.string().min(1),
  chat_type: z.enum(["direct", "group"]),
  sender_id: z.string().min(1),
  /** Unix seconds. */
  timestamp: z.number().int().nonnegative(),
  text: z.string(),
  is_mention: z.boolean().default(false),
});

export type InboundEvent = z.infer<typeof inboundEventSchema>;

export interface GatewayServerDeps {
  turns: Pick<TurnHandler, "handle">;
  sharedSecret: string;
  logger: Logger;
  host: string;
  port: number;
}

export class GatewayServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  private readonly logger: Logger;

  constructor(private readonly deps: GatewayServerDeps) {
    this.logger = deps.logger.child({ component: "http" });
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) =>
      c.json({ ok: true, version: VERSION, uptime: Date.now() - this.startedAt }),
    );

    this.app.post("/events/inbound", async (c) => {
      if (c.req.header(SECRET_HEADER) !== this.deps.sharedSecret) {
        return c.json({ ok: false, error: "Unauthorized" }, 401);
      }

      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.json({ ok: false, error: "Invalid JSON body" }, 400);
      }

      const parsed = inboundEventSchema.safeParse(body);
      if (!parsed.success) {
        return c.json(
          { ok: false, error: "Invalid request", details: parsed.error.flatten() },
          400,
        );
      }

      const event = parsed.data;
      try {
        const result = await this.deps.turns.handle({
          chatId: event.chat_id,
          chatKind: event.chat_type,
          senderId: event.sender_id,
          ts: event.timestamp * MS_PER_SECOND,
          text: event.text,
          isMention: event.is_mention,
        });
        if (result.kind === "skipped") {
          return c.json({ ok: true, skipped: result.reason });
        }
        return c.json({ ok: true });
      } catch (err) {
        this.logger.error({ err, chatId: event.chat_id }, "Inbound event failed");
        return c.json({ ok: false, error: errorMessage(err) }, 500);
      }
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.deps.port,
      hostname: this.deps.host,
    });
    this.logger.info({ host: this.deps.host, port: this.deps.port }, "Gateway server started");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.logger.info("Gateway server stopped");
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
