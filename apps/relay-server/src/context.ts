import type { RoutingService } from "@pathsense/routing";

import { HttpError } from "./http/responses";
import type { NavigationRelay } from "./relay/navigationRelay";

export type ServerContext = {
  relay: NavigationRelay;
  routing: RoutingService;
  startedAtMs: number;
  now: () => number;
  clients: () => number;
};

// Next bundles route handlers separately from the custom server, so the context lives on globalThis.
declare global {
  var pathsenseServerContext: ServerContext | undefined;
}

export function setServerContext(context: ServerContext | undefined): void {
  globalThis.pathsenseServerContext = context;
}

export function getServerContext(): ServerContext {
  const context = globalThis.pathsenseServerContext;
  if (!context) {
    throw new HttpError(503, "relay_unavailable");
  }
  return context;
}
