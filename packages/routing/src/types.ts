export type LatLng = {
  lat: number;
  lng: number;
};

/** `[lat, lng]`, the order map overlays draw in. */
export type RoutePoint = [number, number];

export type RouteOptions = {
  wheelchair: boolean;
};

export type RouteInstruction = {
  text: string;
  distanceM: number;
  durationS: number;
  location?: LatLng;
};

export type AccessibilityRating = "good" | "limited" | "poor" | "unknown";

export type ObstacleType = "stairs" | "steep_slope" | "narrow_path";

export type ObstacleSeverity = "critical" | "high" | "medium";

export type AccessibilityObstacle = {
  type: ObstacleType;
  severity: ObstacleSeverity;
  instruction: string;
  location: LatLng | null;
};

export type AccessibilityReport = {
  rating: AccessibilityRating;
  warnings: string[];
  features: string[];
  obstacles: AccessibilityObstacle[];
};

/**
 * What a provider returns before accessibility is assessed. `obstacles` and `warnings` carry
 * anything the provider knows beyond its instruction text.
 */
export type ProviderRoute = {
  geometry: RoutePoint[];
  distanceM: number;
  durationS: number;
  instructions: RouteInstruction[];
  obstacles?: AccessibilityObstacle[];
  warnings?: string[];
};

export type RouteResult = {
  geometry: RoutePoint[];
  distanceM: number;
  durationS: number;
  instructions: RouteInstruction[];
  accessibility: AccessibilityReport;
};

export type PlaceResult = LatLng & {
  label: string;
};

export type PlaceType = "hospital" | "shopping" | "restaurant" | "transport";

export type NearbyPlace = LatLng & {
  name: string;
  type: PlaceType;
  accessibility: AccessibilityRating;
  distanceKm: number;
};
