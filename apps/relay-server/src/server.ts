import { type IncomingMessage, type Server as HttpServer, type ServerResponse, createServer } from "node:http";
import type { AddressInfo } from "node:net";

import type { ClientToServerEvents, ServerToClientEvents } from "@pathsense/nav-core";
import type { RoutingService } from "@pathsense/routing";
import { Server } from "socket.io";

import type { ServerConfig } from "./config";
import { setServerContext } from "./context";
import { NavigationRelay } from "./relay/navigationRelay";
import { createRoutingService } from "./routingService";
import { type NavigationServer, registerNavigationHandlers } from "./socket/registerNavigationHandlers";

/** Shape of Next's `getRequestHandler()`. */
export type NodeRequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>;

export type RelayServerDeps = {
  routing?: RoutingService;
  requestHandler?: NodeRequestHandler;
  random?: () => number;
  now?: () => number;
};

export type RelayServer = {
  httpServer: HttpServer;
  io: NavigationServer;
  relay: NavigationRelay;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
};

const notFound: NodeRequestHandler = async (_request, response) => {
  response.statusCode = 404;
  response.end();
};

export function createRelayServer(config: ServerConfig, deps: RelayServerDeps = {}): RelayServer {
  const now = deps.now ?? Date.now;
  const routing = deps.routing ?? createRoutingService(config.routing);
  const handleRequest = deps.requestHandler ?? notFound;

  // The relay broadcasts through `io`, which needs the HTTP server first.
  let io: NavigationServer | null = null;
  const relay = new NavigationRelay({
    config: config.navigation,
    now,
    random: deps.random,
    broadcast: (state) => io?.emit("navigation_update", state)
  });

  const httpServer = createServer((request, response) => {
    handleRequest(request, response).catch((error: unknown) => {
      console.error(`[Http] ${request.method ?? "GET"} ${request.url ?? "/"} failed:`, error);
      if (!response.headersSent) {
        response.statusCode = 500;
      }
      response.end();
    });
  });
  const socketServer = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: { origin: config.corsOrigin }
  });
  io = socketServer;
  registerNavigationHandlers(socketServer, relay);

  setServerContext({
    relay,
    routing,
    startedAtMs: now(),
    now,
    clients: () => socketServer.engine.clientsCount
  });

  return {
    httpServer,
    io: socketServer,
    relay,
    listen: () =>
      new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(config.port, config.host, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          if (address === null || typeof address === "string") {
            reject(new Error("Server is not listening on a TCP port"));
            return;
          }
          resolve(address);
        });
      }),
    close: async () => {
      relay.dispose();
      setServerContext(undefined);
      // Also closes the underlying HTTP server.
      await new Promise<void>((resolve, reject) => {
        socketServer.close((error) => (error ? reject(error) : resolve())).catch(reject);
      });
    }
  };
}
