import { DEFAULT_FRAME_ANALYSIS_CONFIG, type FrameAnalysisConfig } from "./config";
import { confidenceFor, grayAt, mapToDistance, type RgbaFrame, type ScoredEstimate } from "./rgbaFrame";

const NEUTRAL_GRAY = 128;

export type GroundPlaneAnalysis = ScoredEstimate & {
  groundBrightness: number;
  deviatingPixels: number;
};

/**
 * Takes the bottom band as the walking surface and counts pixels just above it that stand out from
 * its brightness.
 */
export function analyzeGroundPlane(
  frame: RgbaFrame,
  config: FrameAnalysisConfig["ground"] = DEFAULT_FRAME_ANALYSIS_CONFIG.ground
): GroundPlaneAnalysis {
  const { width, height } = frame;
  const groundY = Math.floor(height * config.groundStart);

  let brightness = 0;
  let groundPixels = 0;
  for (let y = groundY; y < height; y += 1) {
    for (let x = Math.floor(width * 0.2); x < Math.floor(width * 0.8); x += 4) {
      brightness += grayAt(frame, x, y);
      groundPixels += 1;
    }
  }
  const groundBrightness = groundPixels > 0 ? brightness / groundPixels : NEUTRAL_GRAY;

  let deviatingPixels = 0;
  for (let y = Math.floor(height * config.probeStart); y < groundY; y += 1) {
    for (let x = Math.floor(width * 0.3); x < Math.floor(width * 0.7); x += 2) {
      if (Math.abs(grayAt(frame, x, y) - groundBrightness) > config.deviation) {
        deviatingPixels += 1;
      }
    }
  }

  return {
    distance: mapToDistance(deviatingPixels, config.distance),
    confidence: confidenceFor(deviatingPixels, config.confidenceAt),
    groundBrightness,
    deviatingPixels
  };
}
