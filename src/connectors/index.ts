import type { ConnectorConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { Connector } from "./connector.js";
import { HttpConnector } from "./http.js";
import { StubConnector } from "./stub.js";

export type { Connector } from "./connector.js";

export function createConnector(config: ConnectorConfig, logger: Logger): Connector {
  switch (config.type) {
    case "stub":
      return new StubConnector(logger);
    case "http":
      return new HttpConnector(config);
  }
}
