import { z } from "zod";

import rawPlaces from "./data/places.json";
import type { NearbyPlace, PlaceResult, PlaceType } from "./types";

const placeResultSchema = z.object({
  label: z.string(),
  lat: z.number(),
  lng: z.number()
});

const nearbyPlaceSchema = z.object({
  name: z.string(),
  type: z.enum(["hospital", "shopping", "restaurant", "transport"]),
  accessibility: z.enum(["good", "limited", "poor", "unknown"]),
  distanceKm: z.number(),
  lat: z.number(),
  lng: z.number()
});

const placesFileSchema = z.object({
  search: z.array(placeResultSchema),
  nearby: z.array(nearbyPlaceSchema)
});

export type PlaceCatalog = {
  search: PlaceResult[];
  nearby: NearbyPlace[];
};

export const BUNDLED_PLACES: PlaceCatalog = placesFileSchema.parse(rawPlaces);

export const PLACE_TYPES: readonly PlaceType[] = ["hospital", "shopping", "restaurant", "transport"];

export function isPlaceType(value: string): value is PlaceType {
  return PLACE_TYPES.some((type) => type === value);
}

export function listNearbyPlaces(
  type: PlaceType | "all" = "all",
  catalog: PlaceCatalog = BUNDLED_PLACES
): NearbyPlace[] {
  return type === "all" ? [...catalog.nearby] : catalog.nearby.filter((place) => place.type === type);
}

export function searchPlaces(
  query: string,
  limit: number,
  catalog: PlaceCatalog = BUNDLED_PLACES
): PlaceResult[] {
  const needle = query.trim().toLowerCase();
  if (needle.length === 0) {
    return [];
  }
  return catalog.search.filter((place) => place.label.toLowerCase().includes(needle)).slice(0, limit);
}
