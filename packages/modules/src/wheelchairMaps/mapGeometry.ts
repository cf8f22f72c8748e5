import type { LatLng, ObstacleType, RoutePoint } from "@pathsense/routing";

export type Endpoint = LatLng & {
  label: string;
};

export type MarkerStyle = {
  icon: string;
  color: string;
  title: string;
};

export const START_MARKER: MarkerStyle = { icon: "🚀", color: "#28a745", title: "Start" };
export const DESTINATION_MARKER: MarkerStyle = { icon: "🏁", color: "#dc3545", title: "Destination" };

export const OBSTACLE_MARKERS: Record<ObstacleType, MarkerStyle> = {
  stairs: { icon: "🚫", color: "#dc3545", title: "STAIRS DETECTED" },
  steep_slope: { icon: "⛰️", color: "#ffc107", title: "STEEP SLOPE" },
  narrow_path: { icon: "↔️", color: "#fd7e14", title: "NARROW PATH" }
};

export type LineFeatureCollection = {
  type: "FeatureCollection";
  features: {
    type: "Feature";
    geometry: { type: "LineString"; coordinates: [number, number][] };
    properties: Record<string, never>;
  }[];
};

/** Route geometry is `[lat, lng]`; MapLibre draws `[lng, lat]`. */
export function toLngLat([lat, lng]: RoutePoint): [number, number] {
  return [lng, lat];
}

export function routeLine(geometry: RoutePoint[]): LineFeatureCollection {
  return {
    type: "FeatureCollection",
    features:
      geometry.length < 2
        ? []
        : [
            {
              type: "Feature",
              geometry: { type: "LineString", coordinates: geometry.map(toLngLat) },
              properties: {}
            }
          ]
  };
}

/** `[[west, south], [east, north]]`, or null for an empty list. */
export function boundsOf(points: LatLng[]): [[number, number], [number, number]] | null {
  const [first, ...rest] = points;
  if (!first) {
    return null;
  }
  let west = first.lng;
  let east = first.lng;
  let south = first.lat;
  let north = first.lat;
  for (const point of rest) {
    west = Math.min(west, point.lng);
    east = Math.max(east, point.lng);
    south = Math.min(south, point.lat);
    north = Math.max(north, point.lat);
  }
  return [
    [west, south],
    [east, north]
  ];
}
