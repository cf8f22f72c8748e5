import { bearingDeg, compassDirection, formatCoordinates, haversineKm, interpolate } from "../geo";
import { BUNDLED_PLACES, type PlaceCatalog, searchPlaces } from "../places";
import type { CompleteRoutingProvider } from "../RoutingProvider";
import type {
  AccessibilityObstacle,
  LatLng,
  PlaceResult,
  ProviderRoute,
  RouteInstruction,
  RouteOptions
} from "../types";

export type MockRoutingOptions = {
  random?: () => number;
  catalog?: PlaceCatalog;
};

export const MOCK_ROUTE_SEGMENTS = 5;
export const WHEELCHAIR_MINUTES_PER_KM = 15;
export const WALKING_MINUTES_PER_KM = 3;

export const UNVERIFIED_ROUTE_WARNINGS = [
  "Route calculated without real-time accessibility data",
  "Please verify path accessibility before proceeding"
];

/**
 * Offline stand-in used when no provider is configured or every provider failed. Never rejects.
 */
export class MockRoutingProvider implements CompleteRoutingProvider {
  readonly name = "mock";
  private readonly random: () => number;
  private readonly catalog: PlaceCatalog;

  constructor(options: MockRoutingOptions = {}) {
    this.random = options.random ?? Math.random;
    this.catalog = options.catalog ?? BUNDLED_PLACES;
  }

  async route(from: LatLng, to: LatLng, options: RouteOptions): Promise<ProviderRoute> {
    const distanceKm = haversineKm(from, to);
    const minutes = Math.round(
      distanceKm * (options.wheelchair ? WHEELCHAIR_MINUTES_PER_KM : WALKING_MINUTES_PER_KM)
    );

    const obstacles: AccessibilityObstacle[] = [];
    if (options.wheelchair && this.random() > 0.5) {
      obstacles.push({
        type: "stairs",
        severity: "critical",
        instruction: "Potential stairs or steps along this route",
        location: { lat: (from.lat + to.lat) / 2, lng: (from.lng + to.lng) / 2 }
      });
    }

    return {
      geometry: interpolate(from, to, MOCK_ROUTE_SEGMENTS),
      distanceM: Math.round(distanceKm * 1000),
      durationS: minutes * 60,
      instructions: mockInstructions(from, to),
      obstacles,
      warnings: options.wheelchair ? [...UNVERIFIED_ROUTE_WARNINGS] : []
    };
  }

  async search(query: string, limit: number): Promise<PlaceResult[]> {
    return searchPlaces(query, limit, this.catalog);
  }

  async reverse(point: LatLng): Promise<string> {
    return formatCoordinates(point);
  }
}

function mockInstructions(from: LatLng, to: LatLng): RouteInstruction[] {
  const heading = compassDirection(bearingDeg(from, to));
  return [
    { text: `Head ${heading}`, distanceM: 200, durationS: 120, location: from },
    { text: "Turn right onto main road", distanceM: 500, durationS: 300 },
    { text: "Continue straight for 1 km", distanceM: 1000, durationS: 600 },
    { text: "Turn left at the intersection", distanceM: 300, durationS: 180 },
    { text: "Arrive at destination", distanceM: 0, durationS: 0, location: to }
  ];
}
