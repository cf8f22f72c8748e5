import {
  BaatoProvider,
  type FetchLike,
  MockRoutingProvider,
  NominatimProvider,
  OpenRouteServiceProvider,
  OsrmProvider,
  type RoutingProvider,
  RoutingService
} from "@pathsense/routing";

import type { RoutingConfig } from "./config";

/**
 * Providers are tried in this order: OpenRouteService, Baato, OSRM, Nominatim, then the mock.
 */
export function createRoutingService(config: RoutingConfig, fetchImpl?: FetchLike): RoutingService {
  const http = fetchImpl ? { fetchImpl } : {};
  const providers: RoutingProvider[] = [];

  if (config.openRouteServiceApiKey) {
    providers.push(new OpenRouteServiceProvider(config.openRouteServiceApiKey, http));
  }
  if (config.baatoApiKey) {
    providers.push(new BaatoProvider(config.baatoApiKey, http));
  }
  if (config.osrmBaseUrl) {
    providers.push(new OsrmProvider(config.osrmBaseUrl, http));
  }
  if (config.nominatimBaseUrl) {
    providers.push(new NominatimProvider({ ...http, baseUrl: config.nominatimBaseUrl }));
  }

  return new RoutingService(providers, new MockRoutingProvider());
}
