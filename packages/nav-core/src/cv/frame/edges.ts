import { DEFAULT_FRAME_ANALYSIS_CONFIG, type FrameAnalysisConfig } from "./config";
import { confidenceFor, grayAt, mapToDistance, type RgbaFrame, type ScoredEstimate } from "./rgbaFrame";

export type EdgeAnalysis = ScoredEstimate & {
  leftEdges: number;
  rightEdges: number;
  totalEdges: number;
};

function gradientMagnitude(frame: RgbaFrame, x: number, y: number): number {
  const gx = grayAt(frame, x + 1, y) - grayAt(frame, x - 1, y);
  const gy = grayAt(frame, x, y + 1) - grayAt(frame, x, y - 1);
  return Math.hypot(gx, gy);
}

/**
 * Counts gradient edges in the lower part of the frame. Edge density in the bottom band drives the
 * distance; the left/right split feeds the direction hint.
 */
export function analyzeEdges(
  frame: RgbaFrame,
  config: FrameAnalysisConfig["edges"] = DEFAULT_FRAME_ANALYSIS_CONFIG.edges
): EdgeAnalysis {
  const { width, height } = frame;
  const startY = Math.max(1, Math.floor(height * config.regionStart));
  const bottomY = Math.floor(height * config.bottomStart);
  const midX = width / 2;

  let leftEdges = 0;
  let rightEdges = 0;
  let bottomEdges = 0;

  for (let y = startY; y < height - 1; y += 1) {
    for (let x = 1; x < width - 1; x += 1) {
      if (gradientMagnitude(frame, x, y) <= config.threshold) {
        continue;
      }
      if (x < midX) {
        leftEdges += 1;
      } else {
        rightEdges += 1;
      }
      if (y >= bottomY) {
        bottomEdges += 1;
      }
    }
  }

  const totalEdges = leftEdges + rightEdges;
  const bottomPixels = (height - bottomY) * width;
  const density = bottomPixels > 0 ? bottomEdges / bottomPixels : 0;

  return {
    distance: mapToDistance(density, config.distance),
    confidence: confidenceFor(totalEdges, config.confidenceAt),
    leftEdges,
    rightEdges,
    totalEdges
  };
}
