import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { FileCatalogSource } from "./adapters/FileCatalogSource.js";
import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createServerApp } from "./app.js";
import { CommandQueue } from "./CommandQueue.js";
import { loadServerConfig } from "./config.js";
import {
  EloRatingService,
  FuzzyGuessEvaluator,
  InMemoryUserGateway,
  SessionRegistry,
  dispatchCommand,
  mulberry32,
} from "./core.js";
import type { CommandContext, ConnectionId } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { SocketGateway } from "./socketGateway.js";

export async function startServer(): Promise<void> {
  const config = loadServerConfig();
  const logger = createConsoleLogger("quiz-duel", config.debug);

  const catalog = await new FileCatalogSource(config.catalogPath, logger).load();
  const registry = new SessionRegistry();
  const users = new InMemoryUserGateway();
  const ratings = new EloRatingService();
  const evaluator = new FuzzyGuessEvaluator(config.game.typoThreshold);
  const bus = new WebSocketBus(logger);
  const queue = new CommandQueue();
  const random = config.seed === undefined ? Math.random : mulberry32(config.seed);

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    registry,
    catalog,
    evaluator,
    users,
    ratings,
    bus,
    scheduler,
    config: config.game,
    random,
    logger,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    dispatch: (command, context) => queue.run(() => dispatchCommand(command, context)),
    logger,
  });

  const sessions = new SocketGateway({ bus, queue, createContext, logger });

  const app = createServerApp({
    port: config.port,
    registry,
    catalog,
    users,
    config: config.game,
    logger,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => {
      let connectionId: ConnectionId | undefined;
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle");
            return;
          }
          connectionId = sessions.open(rawSocket);
        },
        onMessage(event): void {
          if (!connectionId) return;
          if (typeof event.data !== "string") {
            logger.warn("Binary frame ignored", { connectionId });
            return;
          }
          void sessions.receive(connectionId, event.data);
        },
        onClose(): void {
          if (!connectionId) return;
          void sessions.close(connectionId);
          connectionId = undefined;
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal, pendingTimers: scheduler.pending });
    scheduler.dispose();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("quiz-duel").error("Failed to start server", { error });
  process.exit(1);
});
