import type { Direction } from "../../types/reading";
import { DEFAULT_FRAME_ANALYSIS_CONFIG, type FrameAnalysisConfig } from "./config";
import type { ScoredEstimate } from "./rgbaFrame";

export type WeightedEstimate = ScoredEstimate & {
  weight: number;
};

/**
 * Confidence-weighted mean of the estimates. When no estimate carries any weight the fallback
 * distance is returned.
 */
export function combineEstimates(
  estimates: WeightedEstimate[],
  fallbackDistance: number = DEFAULT_FRAME_ANALYSIS_CONFIG.fallbackDistanceCm
): ScoredEstimate {
  if (estimates.length === 0) {
    return { distance: fallbackDistance, confidence: 0 };
  }

  let weightedSum = 0;
  let totalWeight = 0;
  let totalConfidence = 0;
  estimates.forEach((estimate) => {
    const weight = estimate.weight * estimate.confidence;
    weightedSum += estimate.distance * weight;
    totalWeight += weight;
    totalConfidence += estimate.confidence;
  });

  return {
    distance: totalWeight > 0 ? weightedSum / totalWeight : fallbackDistance,
    confidence: totalConfidence / estimates.length
  };
}

/**
 * Points toward the side with fewer edges, i.e. more open space.
 */
export function chooseDirection(
  leftEdges: number,
  rightEdges: number,
  config: FrameAnalysisConfig["direction"] = DEFAULT_FRAME_ANALYSIS_CONFIG.direction
): Direction {
  const ratio = (leftEdges + 1) / (rightEdges + 1);
  if (ratio < config.leftBelow) {
    return "left";
  }
  if (ratio > config.rightAbove) {
    return "right";
  }
  return "straight";
}
