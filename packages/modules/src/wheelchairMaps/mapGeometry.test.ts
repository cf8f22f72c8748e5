import { describe, expect, it } from "vitest";

import { boundsOf, routeLine, toLngLat } from "./mapGeometry";

describe("map geometry", () => {
  it("flips route points into MapLibre order", () => {
    expect(toLngLat([27.7172, 85.324])).toEqual([85.324, 27.7172]);
    expect(
      routeLine([
        [27.7172, 85.324],
        [27.7089, 85.3206]
      ]).features[0]?.geometry.coordinates
    ).toEqual([
      [85.324, 27.7172],
      [85.3206, 27.7089]
    ]);
  });

  it("draws nothing for a route without a segment", () => {
    expect(routeLine([[27.7, 85.3]]).features).toEqual([]);
  });

  it("frames every point", () => {
    expect(
      boundsOf([
        { lat: 27.72, lng: 85.33 },
        { lat: 27.7, lng: 85.31 },
        { lat: 27.71, lng: 85.35 }
      ])
    ).toEqual([
      [85.31, 27.7],
      [85.35, 27.72]
    ]);
    expect(boundsOf([])).toBeNull();
  });
});
