import type { LatLng } from "./types";

export const EARTH_RADIUS_KM = 6371;

export const DEFAULT_LOCATION: LatLng = { lat: 27.7172, lng: 85.324 };

export const SERVICE_AREA = {
  minLat: 26,
  maxLat: 31,
  minLng: 80,
  maxLng: 89
} as const;

const toRad = (value: number) => (value * Math.PI) / 180;

export function haversineKm(from: LatLng, to: LatLng): number {
  const dLat = toRad(to.lat - from.lat);
  const dLng = toRad(to.lng - from.lng);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.sin(dLng / 2) * Math.sin(dLng / 2) * Math.cos(toRad(from.lat)) * Math.cos(toRad(to.lat));
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
}

/** Initial bearing in degrees, 0 = north, clockwise. */
export function bearingDeg(from: LatLng, to: LatLng): number {
  const lat1 = toRad(from.lat);
  const lat2 = toRad(to.lat);
  const dLng = toRad(to.lng - from.lng);
  const y = Math.sin(dLng) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);
  const deg = (Math.atan2(y, x) * 180) / Math.PI;
  return (deg + 360) % 360;
}

const COMPASS = ["north", "northeast", "east", "southeast", "south", "southwest", "west", "northwest"];

export function compassDirection(bearing: number): string {
  const index = Math.round((((bearing % 360) + 360) % 360) / 45) % COMPASS.length;
  return COMPASS[index] ?? "north";
}

export function isValidLatLng(point: LatLng): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lng) &&
    Math.abs(point.lat) <= 90 &&
    Math.abs(point.lng) <= 180
  );
}

export function isWithinServiceArea(point: LatLng): boolean {
  return (
    point.lat >= SERVICE_AREA.minLat &&
    point.lat <= SERVICE_AREA.maxLat &&
    point.lng >= SERVICE_AREA.minLng &&
    point.lng <= SERVICE_AREA.maxLng
  );
}

export function interpolate(from: LatLng, to: LatLng, steps: number): [number, number][] {
  const points: [number, number][] = [];
  for (let i = 0; i <= steps; i += 1) {
    const ratio = i / steps;
    points.push([from.lat + (to.lat - from.lat) * ratio, from.lng + (to.lng - from.lng) * ratio]);
  }
  return points;
}

export function formatCoordinates(point: LatLng): string {
  return `${point.lat.toFixed(5)}, ${point.lng.toFixed(5)}`;
}
