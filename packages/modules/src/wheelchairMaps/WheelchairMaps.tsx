"use client";

import {
  accessibilityLabel,
  DEFAULT_LOCATION,
  formatDistance,
  formatDuration,
  instructionIcon,
  isWithinServiceArea,
  type LatLng,
  type NearbyPlace,
  PLACE_TYPES,
  type PlaceResult,
  type PlaceType,
  ROUTE_COLORS,
  type RouteResult
} from "@pathsense/routing";
import { Button } from "@pathsense/ui-kit";
import { type ComponentType, type FormEvent, useEffect, useMemo, useState } from "react";

import { getCurrentPosition } from "../shared/geolocation";
import type { Endpoint } from "./mapGeometry";
import { MapsApiClient, MapsApiError } from "./mapsApi";
import { RouteMap, type RouteMapProps } from "./RouteMap";

export const DEMO_START: Endpoint = { lat: 27.7172, lng: 85.324, label: "Kathmandu Durbar Square" };
export const DEMO_DESTINATION: Endpoint = { lat: 27.7089, lng: 85.3206, label: "Thamel, Kathmandu" };

const PLACE_FILTER_LABELS: Record<PlaceType | "all", string> = {
  all: "All",
  hospital: "Hospitals",
  shopping: "Shopping",
  restaurant: "Restaurants",
  transport: "Transport"
};

type Field = "from" | "to";

type PlannedRoute = {
  provider: string;
  route: RouteResult;
};

type WheelchairMapsProps = {
  api?: MapsApiClient;
  locate?: () => Promise<LatLng | null>;
  MapView?: ComponentType<RouteMapProps>;
};

const describeRouteError = (error: unknown) => {
  if (error instanceof MapsApiError && error.code === "outside_service_area") {
    return "Route endpoints must be within Nepal. Please select a valid location.";
  }
  return "Unable to calculate route. Please try again.";
};

export function WheelchairMaps({ api, locate = getCurrentPosition, MapView = RouteMap }: WheelchairMapsProps) {
  const client = useMemo(() => api ?? new MapsApiClient(), [api]);
  const [queries, setQueries] = useState<Record<Field, string>>({ from: "", to: "" });
  const [endpoints, setEndpoints] = useState<Record<Field, Endpoint | null>>({ from: null, to: null });
  const [results, setResults] = useState<{ field: Field; places: PlaceResult[] } | null>(null);
  const [selecting, setSelecting] = useState<Field | null>(null);
  const [wheelchair, setWheelchair] = useState(true);
  const [planned, setPlanned] = useState<PlannedRoute | null>(null);
  const [loading, setLoading] = useState(false);
  const [notice, setNotice] = useState<string | null>(null);
  const [places, setPlaces] = useState<NearbyPlace[]>([]);
  const [placeFilter, setPlaceFilter] = useState<PlaceType | "all">("all");

  useEffect(() => {
    let active = true;
    client
      .places("all")
      .then((loaded) => {
        if (active) {
          setPlaces(loaded);
        }
      })
      .catch((error: unknown) => {
        console.warn("[Maps] Nearby places failed:", error);
      });
    return () => {
      active = false;
    };
  }, [client]);

  const setEndpoint = (field: Field, endpoint: Endpoint | null) => {
    setEndpoints((current) => ({ ...current, [field]: endpoint }));
    setQueries((current) => ({ ...current, [field]: endpoint?.label ?? "" }));
    setPlanned(null);
  };

  const planRoute = async (from: Endpoint | null, to: Endpoint | null) => {
    if (!from) {
      setNotice("Please select a starting location or enable location services");
      return;
    }
    if (!to) {
      setNotice("Please select a destination");
      return;
    }
    if (!isWithinServiceArea(from)) {
      setNotice("Starting location seems to be outside Nepal. Please select a valid location.");
      return;
    }
    if (!isWithinServiceArea(to)) {
      setNotice("Destination seems to be outside Nepal. Please select a valid location.");
      return;
    }

    setLoading(true);
    setNotice(null);
    try {
      setPlanned(await client.route(from, to, wheelchair));
    } catch (error) {
      console.error("[Maps] Direction error:", error);
      setPlanned(null);
      setNotice(describeRouteError(error));
    } finally {
      setLoading(false);
    }
  };

  const search = async (field: Field, event: FormEvent) => {
    event.preventDefault();
    const query = queries[field].trim();
    if (query.length < 2) {
      return;
    }
    try {
      const found = await client.geocode(query, 5);
      setResults({ field, places: found });
      if (found.length === 0) {
        setNotice(`No places found for "${query}"`);
      }
    } catch (error) {
      console.warn("[Maps] Search failed:", error);
      setNotice("Search failed. Please try again.");
    }
  };

  const handleMapClick = async (point: LatLng) => {
    if (!selecting) {
      return;
    }
    if (!isWithinServiceArea(point)) {
      setNotice("Please select a location within Nepal");
      return;
    }
    const field = selecting;
    const label = await client.reverse(point).catch((error: unknown) => {
      console.warn("[Maps] Reverse geocode failed:", error);
      return "Selected location";
    });
    setEndpoint(field, { ...point, label });
    setSelecting(null);
  };

  const locateMe = async () => {
    const position = await locate();
    if (position && isWithinServiceArea(position)) {
      setEndpoint("from", { ...position, label: "My location" });
      return;
    }
    setEndpoint("from", { ...DEFAULT_LOCATION, label: "Kathmandu" });
    setNotice("Unable to get your current location. Using Kathmandu as default.");
  };

  const swap = () => {
    setEndpoints((current) => ({ from: current.to, to: current.from }));
    setQueries((current) => ({ from: current.to, to: current.from }));
    setPlanned(null);
  };

  const setDemoRoute = () => {
    setEndpoint("from", DEMO_START);
    setEndpoint("to", DEMO_DESTINATION);
    setNotice('Demo locations set! Click "Get Directions" to see the route.');
  };

  const toggleWheelchair = () => {
    const next = !wheelchair;
    setWheelchair(next);
    setPlanned(null);
    setNotice(`Wheelchair mode ${next ? "enabled" : "disabled"}`);
  };

  const navigateToPlace = (place: NearbyPlace) => {
    const destination = { lat: place.lat, lng: place.lng, label: place.name };
    setEndpoint("to", destination);
    void planRoute(endpoints.from, destination);
  };

  const visiblePlaces = places.filter((place) => placeFilter === "all" || place.type === placeFilter);
  const route = planned?.route ?? null;

  const renderField = (field: Field, label: string) => (
    <form className="mt-2" onSubmit={(event) => void search(field, event)}>
      <label className="text-xs text-gray-600">
        {label}
        <input
          value={queries[field]}
          placeholder="Search places in Kathmandu"
          onFocus={() => setSelecting(field)}
          onChange={(event) => {
            const value = event.target.value;
            setQueries((current) => ({ ...current, [field]: value }));
          }}
          style={{ display: "block", width: "100%" }}
        />
      </label>
      {results?.field === field && results.places.length > 0 && (
        <ul className="mt-2" aria-label={`${label} suggestions`}>
          {results.places.map((place) => (
            <li key={`${place.label}-${place.lat}-${place.lng}`}>
              <button
                type="button"
                className="button button-ghost"
                onClick={() => {
                  setEndpoint(field, place);
                  setResults(null);
                }}
              >
                {place.label}
              </button>
            </li>
          ))}
        </ul>
      )}
    </form>
  );

  return (
    <div className="grid">
      <div className="card">
        <div className="text-sm font-semibold">Wheelchair-friendly routes</div>
        {renderField("from", "From")}
        {renderField("to", "To")}
        {selecting && (
          <p className="text-xs text-gray-500">
            Click on map to select {selecting === "from" ? "starting location" : "destination"}
          </p>
        )}

        <div className="mt-3" style={{ display: "flex", flexWrap: "wrap", gap: "8px" }}>
          <Button onClick={() => void planRoute(endpoints.from, endpoints.to)} disabled={loading}>
            {loading ? "Calculating..." : "Get Directions"}
          </Button>
          <Button variant="ghost" onClick={swap}>
            ⇅ Swap
          </Button>
          <Button variant="ghost" onClick={setDemoRoute}>
            Demo route
          </Button>
          <Button variant="ghost" onClick={() => void locateMe()}>
            📍 My location
          </Button>
          <Button variant="ghost" pressed={wheelchair} onClick={toggleWheelchair}>
            ♿ Wheelchair mode
          </Button>
        </div>
        {notice && (
          <p role="status" className="text-xs text-gray-700 mt-2">
            {notice}
          </p>
        )}

        <div className="mt-3">
          <MapView
            route={route}
            from={endpoints.from}
            to={endpoints.to}
            places={visiblePlaces}
            onMapClick={(point) => void handleMapClick(point)}
          />
        </div>
      </div>

      {planned && route && (
        <div className="card" aria-label="Route summary">
          <div className="text-sm font-semibold">Route via {planned.provider}</div>
          <div className="mt-2" style={{ display: "flex", gap: "16px" }}>
            <span data-testid="route-distance">{formatDistance(route.distanceM)}</span>
            <span data-testid="route-time">{formatDuration(route.durationS)}</span>
            <span data-testid="route-accessibility" style={{ color: ROUTE_COLORS[route.accessibility.rating] }}>
              {accessibilityLabel(route.accessibility.rating)}
            </span>
          </div>

          {route.accessibility.warnings.length > 0 && (
            <ul className="mt-3" aria-label="Accessibility warnings">
              {route.accessibility.warnings.map((warning) => (
                <li key={warning} className="text-xs text-red-600">
                  ⚠️ {warning}
                </li>
              ))}
            </ul>
          )}
          {route.accessibility.features.length > 0 && (
            <ul className="mt-2" aria-label="Accessibility features">
              {route.accessibility.features.map((feature) => (
                <li key={feature} className="text-xs text-gray-700">
                  ✓ {feature}
                </li>
              ))}
            </ul>
          )}

          <ol className="mt-3" aria-label="Turn-by-turn instructions">
            {route.instructions.map((instruction, index) => (
              <li key={`${index}-${instruction.text}`} className="text-sm">
                <span aria-hidden="true">{instructionIcon(instruction.text)}</span> {instruction.text}
                <div className="text-xs text-gray-500">
                  {formatDistance(instruction.distanceM)} • {formatDuration(instruction.durationS)}
                </div>
              </li>
            ))}
          </ol>
        </div>
      )}

      <div className="card">
        <div className="text-sm font-semibold">Nearby accessible places</div>
        <div className="mt-2" role="group" aria-label="Place type" style={{ display: "flex", flexWrap: "wrap", gap: "6px" }}>
          {(["all", ...PLACE_TYPES] as const).map((type) => (
            <Button key={type} variant="ghost" pressed={placeFilter === type} onClick={() => setPlaceFilter(type)}>
              {PLACE_FILTER_LABELS[type]}
            </Button>
          ))}
        </div>
        <ul className="mt-2" aria-label="Nearby places">
          {visiblePlaces.map((place) => (
            <li key={place.name} data-type={place.type} className="mt-2">
              <div className="text-sm">{place.name}</div>
              <div className="text-xs text-gray-500">
                {place.distanceKm} km • {accessibilityLabel(place.accessibility)}
              </div>
              <Button variant="ghost" aria-label={`Directions to ${place.name}`} onClick={() => navigateToPlace(place)}>
                🧭
              </Button>
            </li>
          ))}
        </ul>
      </div>
    </div>
  );
}
