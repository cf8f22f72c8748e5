import { z } from "zod";

import { decodePolyline } from "../polyline";
import { RoutingError, type RoutingProvider } from "../RoutingProvider";
import type { LatLng, PlaceResult, ProviderRoute, RouteOptions } from "../types";
import { type ProviderHttpOptions, requestJson, trimBaseUrl } from "./http";

const baatoDirectionsSchema = z.object({
  data: z
    .array(
      z.object({
        distanceInMeters: z.number(),
        timeInMs: z.number(),
        encodedPolyline: z.string(),
        instructionList: z
          .array(z.object({ text: z.string(), distanceInMeters: z.number(), timeInMs: z.number() }))
          .nullish()
      })
    )
    .nullish()
});

const baatoSearchSchema = z.object({
  data: z
    .array(
      z.object({
        name: z.string(),
        address: z.string().nullish(),
        centroid: z.object({ lat: z.number(), lon: z.number() }).nullish()
      })
    )
    .nullish()
});

const baatoReverseSchema = z.object({
  data: z.array(z.object({ name: z.string().nullish(), address: z.string().nullish() })).nullish()
});

export const BAATO_BASE_URL = "https://api.baato.io/api/v1";

/**
 * Baato (Nepal) directions, search and reverse geocoding. Wheelchair routes use the foot profile.
 */
export class BaatoProvider implements RoutingProvider {
  readonly name = "baato";

  private apiKey: string;
  private baseUrl: string;
  private http: ProviderHttpOptions;

  constructor(apiKey: string, http: ProviderHttpOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = trimBaseUrl(http.baseUrl ?? BAATO_BASE_URL);
    this.http = http;
  }

  private endpoint(path: string): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("key", this.apiKey);
    return url;
  }

  async route(from: LatLng, to: LatLng, options: RouteOptions): Promise<ProviderRoute> {
    const url = this.endpoint("/directions");
    url.searchParams.append("points[]", `${from.lat},${from.lng}`);
    url.searchParams.append("points[]", `${to.lat},${to.lng}`);
    url.searchParams.set("mode", options.wheelchair ? "foot" : "car");
    url.searchParams.set("alternatives", "false");
    url.searchParams.set("instructions", "true");

    const data = await requestJson(this.name, baatoDirectionsSchema, url, {}, this.http);
    const route = data.data?.[0];
    if (!route) {
      throw new RoutingError(this.name, "no route found");
    }

    return {
      geometry: decodePolyline(route.encodedPolyline),
      distanceM: Math.round(route.distanceInMeters),
      durationS: Math.round(route.timeInMs / 1000),
      instructions: (route.instructionList ?? []).map((step) => ({
        text: step.text,
        distanceM: Math.round(step.distanceInMeters),
        durationS: Math.round(step.timeInMs / 1000)
      }))
    };
  }

  async search(query: string, limit: number): Promise<PlaceResult[]> {
    const url = this.endpoint("/search");
    url.searchParams.set("q", query);
    url.searchParams.set("limit", String(limit));

    const data = await requestJson(this.name, baatoSearchSchema, url, {}, this.http);
    return (data.data ?? []).flatMap((item) =>
      item.centroid
        ? [
            {
              label: item.address ? `${item.name}, ${item.address}` : item.name,
              lat: item.centroid.lat,
              lng: item.centroid.lon
            }
          ]
        : []
    );
  }

  async reverse(point: LatLng): Promise<string> {
    const url = this.endpoint("/reverse");
    url.searchParams.set("lat", String(point.lat));
    url.searchParams.set("lon", String(point.lng));

    const data = await requestJson(this.name, baatoReverseSchema, url, {}, this.http);
    const place = data.data?.[0];
    const label = [place?.name, place?.address].filter((part) => Boolean(part)).join(", ");
    if (!label) {
      throw new RoutingError(this.name, "no address found");
    }
    return label;
  }
}
