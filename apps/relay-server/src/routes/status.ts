import type { NavigationRelay } from "../relay/navigationRelay";
import { json } from "../http/responses";

export function createStatusHandler(relay: NavigationRelay) {
  return async (): Promise<Response> => json(relay.snapshot());
}

export type HealthSource = {
  startedAtMs: number;
  now?: () => number;
  clients: () => number;
};

export function createHealthHandler(source: HealthSource) {
  const now = source.now ?? Date.now;
  return async (): Promise<Response> =>
    json({
      status: "ok",
      uptimeS: Math.round((now() - source.startedAtMs) / 1000),
      clients: source.clients()
    });
}
