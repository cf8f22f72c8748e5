"use client";

import { Map as MapLibreMap, NavigationControl, type StyleSpecification } from "maplibre-gl";
import { type RefObject, useEffect, useState } from "react";

import { DEFAULT_LOCATION } from "@pathsense/routing";

export const MAP_STYLE: StyleSpecification = {
  version: 8,
  sources: {
    osm: {
      type: "raster",
      tiles: ["https://tile.openstreetmap.org/{z}/{x}/{y}.png"],
      tileSize: 256,
      attribution: "© OpenStreetMap contributors"
    }
  },
  layers: [{ id: "osm", type: "raster", source: "osm" }]
};

export type MapStatus = "loading" | "ready" | "error";

export function useMapLibre(containerRef: RefObject<HTMLDivElement>) {
  const [map, setMap] = useState<MapLibreMap | null>(null);
  const [status, setStatus] = useState<MapStatus>("loading");

  useEffect(() => {
    const container = containerRef.current;
    if (!container) {
      return;
    }

    let instance: MapLibreMap;
    try {
      instance = new MapLibreMap({
        container,
        style: MAP_STYLE,
        center: [DEFAULT_LOCATION.lng, DEFAULT_LOCATION.lat],
        zoom: 13
      });
    } catch (error) {
      console.error("[Map] Failed to create map:", error);
      setStatus("error");
      return;
    }

    instance.addControl(new NavigationControl(), "top-right");
    instance.on("load", () => {
      setMap(instance);
      setStatus("ready");
    });
    instance.on("error", (event) => {
      console.warn("[Map] error:", event.error.message);
    });

    return () => {
      setMap(null);
      instance.remove();
    };
  }, [containerRef]);

  return { map, status };
}
