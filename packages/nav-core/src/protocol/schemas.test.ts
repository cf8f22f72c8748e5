import { describe, expect, it } from "vitest";

import { cameraAnalysisSchema, describeIssues, startNavigationSchema } from "./schemas";

describe("startNavigationSchema", () => {
  it("defaults to demo mode with or without a payload", () => {
    expect(startNavigationSchema.parse(undefined)).toEqual({ mode: "demo" });
    expect(startNavigationSchema.parse({})).toEqual({ mode: "demo" });
    expect(startNavigationSchema.parse({ mode: "camera" })).toEqual({ mode: "camera" });
  });

  it("rejects unknown modes", () => {
    expect(startNavigationSchema.safeParse({ mode: "lidar" }).success).toBe(false);
  });
});

describe("cameraAnalysisSchema", () => {
  it("accepts a full analysis payload", () => {
    const payload = {
      distance: 42,
      direction: "left",
      confidence: 0.8,
      leftEdges: 12,
      rightEdges: 40,
      instruction: "Obstacle ahead - prepare to turn left",
      obstacleDetected: true
    };

    expect(cameraAnalysisSchema.parse(payload)).toEqual(payload);
  });

  it("reports the offending fields", () => {
    const result = cameraAnalysisSchema.safeParse({
      distance: -1,
      direction: "up",
      instruction: "x"
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      const message = describeIssues(result.error);
      expect(message).toContain("distance:");
      expect(message).toContain("direction:");
    }
  });
});
