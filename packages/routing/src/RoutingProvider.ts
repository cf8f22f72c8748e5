import type { LatLng, PlaceResult, ProviderRoute, RouteOptions } from "./types";

/**
 * A third-party routing or geocoding backend. Providers implement only what their API offers;
 * `RoutingService` skips a provider for operations it leaves out.
 */
export interface RoutingProvider {
  readonly name: string;
  route?(from: LatLng, to: LatLng, options: RouteOptions): Promise<ProviderRoute>;
  search?(query: string, limit: number): Promise<PlaceResult[]>;
  reverse?(point: LatLng): Promise<string>;
}

export type CompleteRoutingProvider = Required<RoutingProvider>;

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export class RoutingError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(provider: string, message: string, status: number | null = null) {
    super(`${provider}: ${message}`);
    this.name = "RoutingError";
    this.provider = provider;
    this.status = status;
  }
}

export const DEFAULT_PROVIDER_TIMEOUT_MS = 8000;
