import { resolve } from "node:path";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getDbPath, getStateDir } from "../config/paths.js";
import type { BotConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { StateDB } from "../storage/db.js";
import { ConversationStore } from "../conversation/store.js";
import { PlanStore } from "../proactive/store.js";
import { ProactiveEngine } from "../proactive/engine.js";
import { createConnector, type Connector } from "../connectors/index.js";
import { GifLibrary } from "../media/gif-library.js";
import { LlmClient } from "../llm/client.js";
import { TurnHandler } from "./turn-handler.js";
import { GatewayServer } from "./server.js";

export interface GatewayContext {
  config: BotConfig;
  logger: Logger;
  db: StateDB;
  conversations: ConversationStore;
  plans: PlanStore;
  connector: Connector;
  gifs: GifLibrary;
  llm: LlmClient;
  turns: TurnHandler;
  server: GatewayServer;
  engine: ProactiveEngine;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startGateway(configPath?: string): Promise<GatewayContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting nudgebot gateway...");

  // 3. State directory and database
  ensureDir(getStateDir());
  const db = new StateDB(getDbPath(config.runtime.dbPath));
  const conversations = new ConversationStore(db);
  const plans = new PlanStore(db);

  // 4. Outbound side
  const connector = createConnector(config.connector, logger);
  const gifs = new GifLibrary(resolve(config.gifFolder));
  logger.info({ connector: connector.id, gifTags: gifs.tags().length }, "Outbound connector ready");

  // 5. Model client
  const llm = new LlmClient(config.llm, logger);
  if (!llm.isConfigured()) {
    logger.warn("Model client not configured, replies will use the dummy fallback");
  }

  // 6. Request path
  const turns = new TurnHandler({ conversations, plans, connector, gifs, model: llm, config, logger });
  const server = new GatewayServer({
    turns,
    sharedSecret: config.security.sharedSecret,
    logger,
    host: config.runtime.host,
    port: config.runtime.port,
  });
  await server.start();

  // 7. Scheduler
  const engine = new ProactiveEngine({ plans, conversations, connector, gifs, logger, config });
  engine.start();

  // 8. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;

  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    engine.stop();
    await server.stop();
    db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("nudgebot gateway started");
  return { config, logger, db, conversations, plans, connector, gifs, llm, turns, server, engine };
}
