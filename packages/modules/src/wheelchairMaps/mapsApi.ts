import type {
  LatLng,
  NearbyPlace,
  PlaceResult,
  PlaceType,
  RouteResult
} from "@pathsense/routing";
import { z } from "zod";

export const ROUTE_ENDPOINT = "/api/navigation/route";
export const GEOCODE_ENDPOINT = "/api/navigation/geocode";
export const REVERSE_ENDPOINT = "/api/navigation/reverse";
export const PLACES_ENDPOINT = "/api/places";

const ratingSchema = z.enum(["good", "limited", "poor", "unknown"]);
const latLngSchema = z.object({ lat: z.number(), lng: z.number() });

const routeResultSchema = z.object({
  geometry: z.array(z.tuple([z.number(), z.number()])),
  distanceM: z.number(),
  durationS: z.number(),
  instructions: z.array(
    z.object({
      text: z.string(),
      distanceM: z.number(),
      durationS: z.number(),
      location: latLngSchema.optional()
    })
  ),
  accessibility: z.object({
    rating: ratingSchema,
    warnings: z.array(z.string()),
    features: z.array(z.string()),
    obstacles: z.array(
      z.object({
        type: z.enum(["stairs", "steep_slope", "narrow_path"]),
        severity: z.enum(["critical", "high", "medium"]),
        instruction: z.string(),
        location: latLngSchema.nullable()
      })
    )
  })
});

const routeResponseSchema = z.object({ provider: z.string(), route: routeResultSchema });
const geocodeResponseSchema = z.object({
  results: z.array(latLngSchema.extend({ label: z.string() }))
});
const reverseResponseSchema = z.object({ label: z.string() });
const placesResponseSchema = z.object({
  places: z.array(
    latLngSchema.extend({
      name: z.string(),
      type: z.enum(["hospital", "shopping", "restaurant", "transport"]),
      accessibility: ratingSchema,
      distanceKm: z.number()
    })
  )
});
const errorResponseSchema = z.object({ error: z.string() });

export class MapsApiError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, status: number) {
    super(`Request failed (${status}): ${code}`);
    this.name = "MapsApiError";
    this.code = code;
    this.status = status;
  }
}

/**
 * Client for the relay server's routing proxy. Provider API keys stay on the server.
 */
export class MapsApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(baseUrl = "", fetchImpl: typeof fetch = (input, init) => fetch(input, init)) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.fetchImpl = fetchImpl;
  }

  async route(from: LatLng, to: LatLng, wheelchair: boolean): Promise<{ provider: string; route: RouteResult }> {
    return this.request(routeResponseSchema, ROUTE_ENDPOINT, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ from, to, wheelchair })
    });
  }

  async geocode(query: string, limit = 5): Promise<PlaceResult[]> {
    const params = new URLSearchParams({ q: query, limit: String(limit) });
    const data = await this.request(geocodeResponseSchema, `${GEOCODE_ENDPOINT}?${params.toString()}`);
    return data.results;
  }

  async reverse(point: LatLng): Promise<string> {
    const params = new URLSearchParams({ lat: String(point.lat), lng: String(point.lng) });
    const data = await this.request(reverseResponseSchema, `${REVERSE_ENDPOINT}?${params.toString()}`);
    return data.label;
  }

  async places(type: PlaceType | "all" = "all"): Promise<NearbyPlace[]> {
    const data = await this.request(placesResponseSchema, `${PLACES_ENDPOINT}?type=${type}`);
    return data.places;
  }

  private async request<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string, init?: RequestInit): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const failure = errorResponseSchema.safeParse(body);
      throw new MapsApiError(failure.success ? failure.data.error : "request_failed", response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new MapsApiError("invalid_response", response.status);
    }
    return parsed.data;
  }
}
