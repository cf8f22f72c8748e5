import { MockRoutingProvider, RoutingService } from "@pathsense/routing";
import { describe, expect, it, vi } from "vitest";

import { withErrorHandling } from "../http/responses";
import { NavigationRelay } from "../relay/navigationRelay";
import { createGeocodeHandler } from "./navigation/geocode";
import { createReverseHandler } from "./navigation/reverse";
import { createRouteHandler } from "./navigation/route";
import { handlePlaces } from "./places";
import { createHealthHandler, createStatusHandler } from "./status";

const logger = { info: vi.fn(), warn: vi.fn() };
const routing = new RoutingService([], new MockRoutingProvider({ random: () => 0 }), logger);

const get = (path: string) => new Request(`http://localhost${path}`);
const post = (path: string, body: string) =>
  new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body
  });

describe("status routes", () => {
  it("returns the current navigation state", async () => {
    const relay = new NavigationRelay({ broadcast: () => undefined, logger });
    const response = await createStatusHandler(relay)();

    expect(await response.json()).toEqual({
      isRunning: false,
      mode: "demo",
      distance: 0,
      direction: "",
      lastInstruction: "",
      obstacleDetected: false,
      confidence: null,
      updatedAt: null
    });
  });

  it("reports uptime and connected clients", async () => {
    const handler = createHealthHandler({ startedAtMs: 1000, now: () => 61_400, clients: () => 3 });

    expect(await (await handler()).json()).toEqual({ status: "ok", uptimeS: 60, clients: 3 });
  });
});

describe("POST /api/navigation/route", () => {
  // invalid_json is raised as an HttpError and mapped by the error wrapper.
  const handler = withErrorHandling(createRouteHandler(routing));

  it("returns a route with its provider", async () => {
    const response = await handler(
      post(
        "/api/navigation/route",
        JSON.stringify({
          from: { lat: 27.7172, lng: 85.324 },
          to: { lat: 27.7089, lng: 85.3206 },
          wheelchair: false
        })
      )
    );
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.status).toBe("ok");
    expect(body.provider).toBe("mock");
    expect(body.route.geometry).toHaveLength(6);
    expect(body.route.accessibility.rating).toBe("good");
  });

  it("rejects malformed JSON", async () => {
    const response = await handler(post("/api/navigation/route", "{"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: "error", error: "invalid_json" });
  });

  it("rejects payloads without coordinates", async () => {
    const response = await handler(
      post("/api/navigation/route", JSON.stringify({ from: { lat: 27.7 } }))
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: "error", error: "invalid_payload" });
  });

  it("refuses routes outside the service area", async () => {
    const response = await handler(
      post(
        "/api/navigation/route",
        JSON.stringify({ from: { lat: 51.5, lng: -0.12 }, to: { lat: 27.7089, lng: 85.3206 } })
      )
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({ status: "error", error: "outside_service_area" });
  });
});

describe("geocoding routes", () => {
  it("searches places", async () => {
    const response = await createGeocodeHandler(routing)(get("/api/navigation/geocode?q=boudha"));

    expect(await response.json()).toEqual({
      status: "ok",
      provider: "mock",
      results: [{ label: "Boudhanath Stupa", lat: 27.7215, lng: 85.3628 }]
    });
  });

  it("requires a query", async () => {
    const response = await createGeocodeHandler(routing)(get("/api/navigation/geocode?q=%20"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: "error", error: "missing_query" });
  });

  it("reverse geocodes coordinates", async () => {
    const response = await createReverseHandler(routing)(
      get("/api/navigation/reverse?lat=27.7172&lng=85.324")
    );

    expect(await response.json()).toEqual({
      status: "ok",
      provider: "mock",
      label: "27.71720, 85.32400"
    });
  });

  it("rejects missing or out-of-range coordinates", async () => {
    const handler = createReverseHandler(routing);

    expect((await handler(get("/api/navigation/reverse?lat=&lng=85"))).status).toBe(400);
    expect((await handler(get("/api/navigation/reverse?lat=95&lng=85"))).status).toBe(400);
  });
});

describe("GET /api/places", () => {
  it("filters nearby places by type", async () => {
    const body = await (await handlePlaces(get("/api/places?type=hospital"))).json();

    expect(body.status).toBe("ok");
    expect(body.places).toHaveLength(1);
    expect(body.places[0].name).toBe("Norvic International Hospital");
  });

  it("lists every place by default and rejects unknown types", async () => {
    expect((await (await handlePlaces(get("/api/places"))).json()).places).toHaveLength(4);
    expect((await handlePlaces(get("/api/places?type=museum"))).status).toBe(400);
  });
});
