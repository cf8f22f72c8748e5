import { z } from "zod";

import { RoutingError, type RoutingProvider } from "../RoutingProvider";
import type { LatLng, ProviderRoute, RoutePoint } from "../types";
import { type ProviderHttpOptions, requestJson, trimBaseUrl } from "./http";

const maneuverSchema = z.object({
  type: z.string(),
  modifier: z.string().optional(),
  location: z.tuple([z.number(), z.number()]),
  exit: z.number().optional()
});

const osrmStepSchema = z.object({
  distance: z.number(),
  duration: z.number(),
  name: z.string().default(""),
  maneuver: maneuverSchema
});

const osrmRouteSchema = z.object({
  routes: z
    .array(
      z.object({
        distance: z.number(),
        duration: z.number(),
        geometry: z.object({ coordinates: z.array(z.tuple([z.number(), z.number()])) }),
        legs: z.array(z.object({ steps: z.array(osrmStepSchema).default([]) })).default([])
      })
    )
    .default([])
});

export type OsrmStep = z.infer<typeof osrmStepSchema>;

export function describeManeuver(step: OsrmStep): string {
  const name = step.name ? ` onto ${step.name}` : "";
  const modifier = step.maneuver.modifier ? step.maneuver.modifier.replace("-", " ") : "";
  switch (step.maneuver.type) {
    case "depart":
      return `Start${modifier ? ` and head ${modifier}` : ""}${name}`;
    case "arrive":
      return "Arrive at destination";
    case "turn":
      return `Turn ${modifier || "ahead"}${name}`;
    case "merge":
      return `Merge ${modifier || "ahead"}${name}`;
    case "roundabout":
      return step.maneuver.exit
        ? `Enter the roundabout and take exit ${step.maneuver.exit}${name}`
        : `Enter the roundabout${name}`;
    default:
      return `Continue${name}`;
  }
}

/**
 * OSRM foot profile. OSRM knows nothing about wheelchairs, so accessibility comes only from the
 * instruction text.
 */
export class OsrmProvider implements RoutingProvider {
  readonly name = "osrm";
  private baseUrl: string;
  private http: ProviderHttpOptions;

  constructor(baseUrl: string, http: ProviderHttpOptions = {}) {
    this.baseUrl = trimBaseUrl(baseUrl);
    this.http = http;
  }

  async route(from: LatLng, to: LatLng): Promise<ProviderRoute> {
    const url = new URL(
      `${this.baseUrl}/route/v1/foot/${from.lng},${from.lat};${to.lng},${to.lat}`
    );
    url.searchParams.set("overview", "full");
    url.searchParams.set("geometries", "geojson");
    url.searchParams.set("steps", "true");

    const data = await requestJson(this.name, osrmRouteSchema, url, {}, this.http);
    const route = data.routes[0];
    if (!route) {
      throw new RoutingError(this.name, "no route found");
    }

    const steps = route.legs.flatMap((leg) => leg.steps);
    return {
      geometry: route.geometry.coordinates.map(([lng, lat]): RoutePoint => [lat, lng]),
      distanceM: Math.round(route.distance),
      durationS: Math.round(route.duration),
      instructions: steps.map((step) => ({
        text: describeManeuver(step),
        distanceM: Math.round(step.distance),
        durationS: Math.round(step.duration),
        location: { lat: step.maneuver.location[1], lng: step.maneuver.location[0] }
      }))
    };
  }
}
