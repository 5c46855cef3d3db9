import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { loadDictionary } from "./adapters/FileDictionaryLoader.js";
import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { loadBackendConfig } from "./config.js";
import {
  InMemoryPlayerGateway,
  InMemorySessionGateway,
  createGameConfig,
  dispatchCommand,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(): Promise<void> {
  const env = loadBackendConfig();
  const logger = createConsoleLogger("backend-local", { debug: env.debug });
  const config = createGameConfig();
  const dictionary = await loadDictionary(env.dictionaryPath, { logger });
  const sessionGateway = new InMemorySessionGateway();
  const playerGateway = new InMemoryPlayerGateway(config.startingBalance);
  const bus = new WebSocketBus(logger);

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    sessionGateway,
    playerGateway,
    dictionary,
    bus,
    scheduler,
    config,
    logger,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  if (!env.adminToken) {
    logger.warn("ADMIN_TOKEN is not set. Admin routes are disabled.");
  }

  const app = createBackendApp({
    port: env.port,
    logger,
    createContext,
    dispatch: dispatchCommand,
    ...(env.adminToken !== undefined ? { adminToken: env.adminToken } : {}),
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/:chatId",
    upgradeWebSocket((c: Context) => {
      const chatId = c.req.param("chatId") ?? "";
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { chatId });
            return;
          }
          bus.attach(chatId, rawSocket);
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: env.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    logger.info("Shutting down");
    scheduler.dispose();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
