import type { RoutePoint } from "./types";

const readValue = (encoded: string, start: number): { value: number; next: number } => {
  let result = 0;
  let shift = 0;
  let index = start;
  let byte: number;
  do {
    if (index >= encoded.length) {
      throw new RangeError(`Truncated polyline at offset ${start}`);
    }
    byte = encoded.charCodeAt(index) - 63;
    index += 1;
    result |= (byte & 0x1f) << shift;
    shift += 5;
  } while (byte >= 0x20);

  const value = result & 1 ? ~(result >> 1) : result >> 1;
  return { value, next: index };
};

/**
 * Decodes a Google encoded polyline into `[lat, lng]` points.
 */
export function decodePolyline(encoded: string, precision = 1e5): RoutePoint[] {
  const points: RoutePoint[] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;

  while (index < encoded.length) {
    const latStep = readValue(encoded, index);
    const lngStep = readValue(encoded, latStep.next);
    lat += latStep.value;
    lng += lngStep.value;
    index = lngStep.next;
    points.push([lat / precision, lng / precision]);
  }

  return points;
}
