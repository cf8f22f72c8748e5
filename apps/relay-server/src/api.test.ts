import { MockRoutingProvider, RoutingService } from "@pathsense/routing";
import { afterEach, describe, expect, it, vi } from "vitest";

import { apiHandlers } from "./api";
import { setServerContext } from "./context";
import { NavigationRelay } from "./relay/navigationRelay";

const logger = { info: vi.fn(), warn: vi.fn() };
const get = (path: string) => new Request(`http://localhost${path}`);

const installContext = () => {
  const relay = new NavigationRelay({ broadcast: () => undefined, logger, now: () => 5000 });
  setServerContext({
    relay,
    routing: new RoutingService([], new MockRoutingProvider({ random: () => 0 }), logger),
    startedAtMs: 1000,
    now: () => 31_000,
    clients: () => 2
  });
  return relay;
};

describe("apiHandlers", () => {
  afterEach(() => setServerContext(undefined));

  it("answers 503 until a relay server is running", async () => {
    const response = await apiHandlers.status(get("/api/status"));

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ status: "error", error: "relay_unavailable" });
  });

  it("reads state and health from the running relay", async () => {
    const relay = installContext();
    relay.start("camera");

    const state = await (await apiHandlers.status(get("/api/status"))).json();
    expect(state).toMatchObject({ isRunning: true, mode: "camera" });

    const health = await (await apiHandlers.health(get("/api/health"))).json();
    expect(health).toEqual({ status: "ok", uptimeS: 30, clients: 2 });
    relay.dispose();
  });

  it("geocodes through the context's routing service", async () => {
    installContext();
    const response = await apiHandlers.reverse(get("/api/navigation/reverse?lat=27.7&lng=85.3"));

    expect(await response.json()).toEqual({
      status: "ok",
      provider: "mock",
      label: "27.70000, 85.30000"
    });
  });

  it("serves places without a relay", async () => {
    const response = await apiHandlers.places(get("/api/places?type=hospital"));

    expect(response.status).toBe(200);
  });

  it("answers unknown API paths with not_found", async () => {
    const response = await apiHandlers.notFound(get("/api/unknown"));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ status: "error", error: "not_found" });
  });
});
