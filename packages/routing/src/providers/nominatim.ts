import { z } from "zod";

import { RoutingError, type RoutingProvider } from "../RoutingProvider";
import type { LatLng, PlaceResult } from "../types";
import { type ProviderHttpOptions, requestJson, trimBaseUrl } from "./http";

const nominatimSearchSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string()
  })
);

const nominatimReverseSchema = z.object({
  display_name: z.string().optional(),
  error: z.string().optional()
});

export const NOMINATIM_BASE_URL = "https://nominatim.openstreetmap.org";
export const NOMINATIM_USER_AGENT = "PathSense/0.1 (accessibility navigation demo)";
export const MAX_SEARCH_RESULTS = 8;

/**
 * OpenStreetMap Nominatim geocoding. Requests carry an identifying User-Agent as the usage
 * policy asks.
 */
export class NominatimProvider implements RoutingProvider {
  readonly name = "nominatim";
  private baseUrl: string;
  private http: ProviderHttpOptions;

  constructor(http: ProviderHttpOptions = {}) {
    this.baseUrl = trimBaseUrl(http.baseUrl ?? NOMINATIM_BASE_URL);
    this.http = http;
  }

  private headers(): Record<string, string> {
    return { "User-Agent": NOMINATIM_USER_AGENT, "Accept-Language": "en" };
  }

  async search(query: string, limit: number): Promise<PlaceResult[]> {
    const url = new URL(`${this.baseUrl}/search`);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("q", query);
    url.searchParams.set("limit", String(Math.min(MAX_SEARCH_RESULTS, Math.max(1, limit))));
    url.searchParams.set("addressdetails", "0");

    const data = await requestJson(
      this.name,
      nominatimSearchSchema,
      url,
      { headers: this.headers() },
      this.http
    );
    return data.map((item) => ({ label: item.display_name, lat: item.lat, lng: item.lon }));
  }

  async reverse(point: LatLng): Promise<string> {
    const url = new URL(`${this.baseUrl}/reverse`);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("lat", String(point.lat));
    url.searchParams.set("lon", String(point.lng));

    const data = await requestJson(
      this.name,
      nominatimReverseSchema,
      url,
      { headers: this.headers() },
      this.http
    );
    if (!data.display_name) {
      throw new RoutingError(this.name, data.error ?? "no address found");
    }
    return data.display_name;
  }
}
