export * from "./types";
export * from "./RoutingProvider";
export * from "./RoutingService";
export * from "./geo";
export * from "./polyline";
export * from "./accessibility";
export * from "./presentation";
export * from "./places";

export * from "./providers/openRouteService";
export * from "./providers/baato";
export * from "./providers/osrm";
export * from "./providers/nominatim";
export * from "./providers/mockProvider";
export type { ProviderHttpOptions } from "./providers/http";
