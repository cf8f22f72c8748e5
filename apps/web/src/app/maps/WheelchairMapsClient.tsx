"use client";

import dynamic from "next/dynamic";

// MapLibre touches `window` on import.
export const WheelchairMapsClient = dynamic(
  () => import("@pathsense/modules").then((modules) => modules.WheelchairMaps),
  {
    ssr: false,
    loading: () => <p className="text-sm text-gray-600">Loading map…</p>
  }
);
