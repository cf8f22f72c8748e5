/**
 * Linear score-to-distance mapping: `clamp(base - value * scale, min, max)` centimetres.
 */
export type DistanceMapping = {
  base: number;
  scale: number;
  min: number;
  max: number;
};

export type FrameAnalysisConfig = {
  edges: {
    threshold: number;
    regionStart: number;
    bottomStart: number;
    distance: DistanceMapping;
    confidenceAt: number;
  };
  texture: {
    blockSize: number;
    regionStart: number;
    distance: DistanceMapping;
    confidenceAt: number;
  };
  contrast: {
    laneWidth: number;
    regionStart: number;
    columnStep: number;
    rowStep: number;
    distance: DistanceMapping;
    confidenceAt: number;
  };
  ground: {
    groundStart: number;
    probeStart: number;
    deviation: number;
    distance: DistanceMapping;
    confidenceAt: number;
  };
  weights: {
    edges: number;
    texture: number;
    contrast: number;
    ground: number;
  };
  direction: {
    leftBelow: number;
    rightAbove: number;
  };
  fallbackDistanceCm: number;
  smoothingWindow: number;
};

// Hand-tuned starting points; recalibrate against real footage before relying on them.
export const DEFAULT_FRAME_ANALYSIS_CONFIG: FrameAnalysisConfig = {
  edges: {
    threshold: 25,
    regionStart: 0.4,
    bottomStart: 0.7,
    distance: { base: 180, scale: 2000, min: 25, max: 250 },
    confidenceAt: 1000
  },
  texture: {
    blockSize: 8,
    regionStart: 0.6,
    distance: { base: 150, scale: 0.1, min: 30, max: 200 },
    confidenceAt: 1000
  },
  contrast: {
    laneWidth: 0.6,
    regionStart: 0.5,
    columnStep: 4,
    rowStep: 2,
    distance: { base: 140, scale: 3, min: 25, max: 180 },
    confidenceAt: 50
  },
  ground: {
    groundStart: 0.8,
    probeStart: 0.6,
    deviation: 30,
    distance: { base: 120, scale: 0.1, min: 20, max: 200 },
    confidenceAt: 500
  },
  weights: {
    edges: 0.3,
    texture: 0.25,
    contrast: 0.25,
    ground: 0.2
  },
  direction: {
    leftBelow: 0.7,
    rightAbove: 1.3
  },
  fallbackDistanceCm: 100,
  smoothingWindow: 5
};
