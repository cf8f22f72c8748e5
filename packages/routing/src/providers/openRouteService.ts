import { z } from "zod";

import type { RoutingProvider } from "../RoutingProvider";
import type { LatLng, ProviderRoute, RouteInstruction, RoutePoint, RouteOptions } from "../types";
import { type ProviderHttpOptions, requestJson, trimBaseUrl } from "./http";

const coordinateSchema = z.tuple([z.number(), z.number()]).rest(z.number());

const orsDirectionsSchema = z.object({
  features: z
    .array(
      z.object({
        geometry: z.object({ coordinates: z.array(coordinateSchema) }),
        properties: z.object({
          summary: z
            .object({ distance: z.number().optional(), duration: z.number().optional() })
            .default({}),
          segments: z
            .array(
              z.object({
                steps: z
                  .array(
                    z.object({
                      instruction: z.string(),
                      distance: z.number(),
                      duration: z.number(),
                      way_points: z.array(z.number()).optional()
                    })
                  )
                  .default([])
              })
            )
            .default([])
        })
      })
    )
    .min(1)
});

export const OPENROUTESERVICE_BASE_URL = "https://api.openrouteservice.org";

/**
 * OpenRouteService directions. ORS offers a dedicated wheelchair profile; search and reverse are
 * left to other providers.
 */
export class OpenRouteServiceProvider implements RoutingProvider {
  readonly name = "openrouteservice";

  private apiKey: string;
  private baseUrl: string;
  private http: ProviderHttpOptions;

  constructor(apiKey: string, http: ProviderHttpOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = trimBaseUrl(http.baseUrl ?? OPENROUTESERVICE_BASE_URL);
    this.http = http;
  }

  async route(from: LatLng, to: LatLng, options: RouteOptions): Promise<ProviderRoute> {
    const profile = options.wheelchair ? "wheelchair" : "foot-walking";
    const url = new URL(`${this.baseUrl}/v2/directions/${profile}/geojson`);

    const data = await requestJson(
      this.name,
      orsDirectionsSchema,
      url,
      {
        method: "POST",
        headers: {
          Authorization: this.apiKey,
          "Content-Type": "application/json",
          Accept: "application/geo+json, application/json"
        },
        body: JSON.stringify({
          coordinates: [
            [from.lng, from.lat],
            [to.lng, to.lat]
          ],
          instructions: true
        })
      },
      this.http
    );

    const [feature] = data.features;
    if (!feature) {
      return { geometry: [], distanceM: 0, durationS: 0, instructions: [] };
    }

    const geometry: RoutePoint[] = feature.geometry.coordinates.map(
      ([lng, lat]): RoutePoint => [lat, lng]
    );
    const instructions: RouteInstruction[] = feature.properties.segments.flatMap((segment) =>
      segment.steps.map((step) => {
        const waypoint = step.way_points?.[0];
        const point = waypoint === undefined ? undefined : geometry[waypoint];
        return {
          text: step.instruction,
          distanceM: step.distance,
          durationS: step.duration,
          ...(point ? { location: { lat: point[0], lng: point[1] } } : {})
        };
      })
    );

    return {
      geometry,
      distanceM: Math.round(feature.properties.summary.distance ?? 0),
      durationS: Math.round(feature.properties.summary.duration ?? 0),
      instructions
    };
  }
}
