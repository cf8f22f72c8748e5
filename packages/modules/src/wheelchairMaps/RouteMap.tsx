"use client";

import { accessibilityLabel, type LatLng, type NearbyPlace, ROUTE_COLORS, type RouteResult } from "@pathsense/routing";
import { type GeoJSONSource, type MapMouseEvent, Marker, Popup } from "maplibre-gl";
import { useEffect, useRef } from "react";

import {
  boundsOf,
  DESTINATION_MARKER,
  type Endpoint,
  type MarkerStyle,
  OBSTACLE_MARKERS,
  routeLine,
  START_MARKER
} from "./mapGeometry";
import { useMapLibre } from "./useMapLibre";

const ROUTE_SOURCE = "route-line";

export type RouteMapProps = {
  route: RouteResult | null;
  from: Endpoint | null;
  to: Endpoint | null;
  places: NearbyPlace[];
  onMapClick?: (point: LatLng) => void;
};

const markerElement = (style: MarkerStyle) => {
  const element = document.createElement("div");
  element.className = "map-marker";
  element.textContent = style.icon;
  element.style.background = style.color;
  return element;
};

export function RouteMap({ route, from, to, places, onMapClick }: RouteMapProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const { map, status } = useMapLibre(containerRef);
  const clickRef = useRef(onMapClick);
  clickRef.current = onMapClick;

  useEffect(() => {
    if (!map) {
      return;
    }
    const handler = (event: MapMouseEvent) => {
      clickRef.current?.({ lat: event.lngLat.lat, lng: event.lngLat.lng });
    };
    map.on("click", handler);
    return () => {
      map.off("click", handler);
    };
  }, [map]);

  useEffect(() => {
    if (!map) {
      return;
    }
    const data = routeLine(route?.geometry ?? []);
    const color = ROUTE_COLORS[route?.accessibility.rating ?? "unknown"];
    const source = map.getSource<GeoJSONSource>(ROUTE_SOURCE);
    if (source) {
      source.setData(data);
      map.setPaintProperty(ROUTE_SOURCE, "line-color", color);
    } else {
      map.addSource(ROUTE_SOURCE, { type: "geojson", data });
      map.addLayer({
        id: ROUTE_SOURCE,
        type: "line",
        source: ROUTE_SOURCE,
        layout: { "line-join": "round", "line-cap": "round" },
        paint: { "line-color": color, "line-width": 6, "line-opacity": 0.8 }
      });
    }

    const framed = route
      ? route.geometry.map(([lat, lng]) => ({ lat, lng }))
      : [from, to].flatMap((point) => (point ? [point] : []));
    const bounds = boundsOf(framed);
    if (bounds) {
      map.fitBounds(bounds, { padding: 40, maxZoom: 16, duration: 800 });
    }
  }, [map, route, from, to]);

  useEffect(() => {
    if (!map) {
      return;
    }
    const markers: Marker[] = [];
    const add = (point: LatLng, style: MarkerStyle, text: string) => {
      markers.push(
        new Marker({ element: markerElement(style) })
          .setLngLat([point.lng, point.lat])
          .setPopup(new Popup({ offset: 16 }).setText(text))
          .addTo(map)
      );
    };

    if (from) {
      add(from, START_MARKER, `${START_MARKER.icon} Start: ${from.label}`);
    }
    if (to) {
      add(to, DESTINATION_MARKER, `${DESTINATION_MARKER.icon} Destination: ${to.label}`);
    }
    route?.accessibility.obstacles.forEach((obstacle) => {
      if (obstacle.location) {
        const style = OBSTACLE_MARKERS[obstacle.type];
        add(obstacle.location, style, `⚠️ ${style.title}: ${obstacle.instruction}`);
      }
    });
    places.forEach((place) => {
      add(
        place,
        { icon: "📍", color: ROUTE_COLORS[place.accessibility], title: place.name },
        `${place.name} (${accessibilityLabel(place.accessibility)})`
      );
    });

    return () => markers.forEach((marker) => marker.remove());
  }, [map, route, from, to, places]);

  return (
    <div>
      <div className="map-surface" ref={containerRef} />
      {status === "loading" && <p className="text-xs text-gray-500">Loading map...</p>}
      {status === "error" && <p className="text-xs text-red-600">Map failed to load.</p>}
    </div>
  );
}
