import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext, WSMessageReceive } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { FileSessionGateway } from "./adapters/FileSessionGateway.js";
import { loadStorySeed } from "./adapters/loadStorySeed.js";
import { OllamaNarrationGenerator } from "./adapters/OllamaNarrationGenerator.js";
import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketConnection } from "./adapters/WebSocketConnection.js";
import { createBackendApp } from "./app.js";
import { loadBackendConfig } from "./config.js";
import {
  ConnectionRegistry,
  InMemorySessionLock,
  createGameConfig,
  dispatchCommand,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { handleClientFrame } from "./ws.js";

export async function startServer(): Promise<void> {
  const settings = loadBackendConfig();
  const logger = createConsoleLogger("backend-local", settings.logLevel);
  const seed = await loadStorySeed(settings.storySeedPath, logger);

  const config = createGameConfig({
    narrationEnabled: settings.llmProvider !== "none",
    narrationTimeoutMs: settings.narrationTimeoutMs,
  });
  const sessionGateway = new FileSessionGateway({
    dataDir: settings.dataDir,
    seedFor: () => seed,
    logger,
  });
  const registry = new ConnectionRegistry({ sendTimeoutMs: config.sendTimeoutMs, logger });
  const locks = new InMemorySessionLock();
  const narrator = new OllamaNarrationGenerator({
    endpoint: settings.llmEndpoint,
    model: settings.llmModel,
    logger,
  });

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    sessionGateway,
    bus: registry,
    narrator,
    scheduler,
    locks,
    config,
    logger,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  const app = createBackendApp({
    port: settings.port,
    logger,
    createContext,
    dispatch: dispatchCommand,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => {
      let connection: WebSocketConnection | undefined;
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle");
            return;
          }
          connection = new WebSocketConnection(rawSocket);
          registry.connect(connection);
        },
        async onMessage(event: MessageEvent<WSMessageReceive>): Promise<void> {
          if (!connection) return;
          const data = typeof event.data === "string" ? event.data : String(event.data);
          await handleClientFrame(registry, connection, data, logger);
        },
        async onClose(): Promise<void> {
          if (!connection) return;
          await registry.disconnect(connection);
          connection = undefined;
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: settings.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
