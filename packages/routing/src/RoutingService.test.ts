import { describe, expect, it, vi } from "vitest";

import { MockRoutingProvider } from "./providers/mockProvider";
import { RoutingError, type RoutingProvider } from "./RoutingProvider";
import { RoutingService } from "./RoutingService";
import type { RoutePoint } from "./types";

const silentLogger = { info: vi.fn(), warn: vi.fn() };

const from = { lat: 27.7172, lng: 85.324 };
const geometry: RoutePoint[] = [
  [27.7172, 85.324],
  [27.7089, 85.3206]
];
const to = { lat: 27.7089, lng: 85.3206 };

describe("RoutingService", () => {
  it("uses the first provider that succeeds and assesses accessibility", async () => {
    const failing: RoutingProvider = {
      name: "down",
      route: vi.fn(async () => {
        throw new RoutingError("down", "HTTP 503", 503);
      })
    };
    const working: RoutingProvider = {
      name: "up",
      route: vi.fn(async () => ({
        geometry,
        distanceM: 1000,
        durationS: 900,
        instructions: [{ text: "Climb the steps", distanceM: 1000, durationS: 900 }]
      }))
    };
    const logger = { info: vi.fn(), warn: vi.fn() };
    const service = new RoutingService([failing, working], new MockRoutingProvider(), logger);

    const result = await service.route(from, to, { wheelchair: true });

    expect(result.provider).toBe("up");
    expect(result.route.accessibility.rating).toBe("poor");
    expect(result.route.accessibility.obstacles.map((obstacle) => obstacle.type)).toEqual([
      "stairs",
      "steep_slope"
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to the mock provider when every provider fails", async () => {
    const failing: RoutingProvider = {
      name: "down",
      route: async () => {
        throw new Error("offline");
      }
    };
    const service = new RoutingService(
      [failing],
      new MockRoutingProvider({ random: () => 0 }),
      silentLogger
    );

    const result = await service.route(from, to, { wheelchair: true });

    expect(result.provider).toBe("mock");
    expect(result.route.geometry).toHaveLength(6);
    expect(result.route.accessibility.rating).toBe("limited");
  });

  it("skips providers that do not offer an operation", async () => {
    const routeOnly: RoutingProvider = { name: "route-only", route: vi.fn() };
    const service = new RoutingService([routeOnly], new MockRoutingProvider(), silentLogger);

    const result = await service.search("thamel", 5);

    expect(result).toEqual({
      provider: "mock",
      results: [{ label: "Thamel", lat: 27.7172, lng: 85.3106 }]
    });
  });

  it("trims search results to the limit", async () => {
    const geocoder: RoutingProvider = {
      name: "geo",
      search: async () => [
        { label: "A", lat: 27.7, lng: 85.3 },
        { label: "B", lat: 27.8, lng: 85.4 }
      ]
    };
    const service = new RoutingService([geocoder], new MockRoutingProvider(), silentLogger);

    expect((await service.search("a", 1)).results).toEqual([{ label: "A", lat: 27.7, lng: 85.3 }]);
  });

  it("reverse geocodes through the fallback", async () => {
    const service = new RoutingService([], new MockRoutingProvider(), silentLogger);

    expect(await service.reverse({ lat: 27.7172, lng: 85.324 })).toEqual({
      provider: "mock",
      label: "27.71720, 85.32400"
    });
    expect(service.providerNames()).toEqual(["mock"]);
  });
});
