import { DEFAULT_FRAME_ANALYSIS_CONFIG, type FrameAnalysisConfig } from "./config";
import { confidenceFor, grayAt, mapToDistance, type RgbaFrame, type ScoredEstimate } from "./rgbaFrame";

/**
 * Mean vertical gray-level change along sampled columns of the walking lane.
 */
export function analyzeContrast(
  frame: RgbaFrame,
  config: FrameAnalysisConfig["contrast"] = DEFAULT_FRAME_ANALYSIS_CONFIG.contrast
): ScoredEstimate {
  const { width, height } = frame;
  const centerX = Math.floor(width / 2);
  const halfLane = Math.floor(Math.floor(width * config.laneWidth) / 2);
  const startX = centerX - halfLane;
  const endX = centerX + halfLane;
  const startY = Math.floor(height * config.regionStart);

  let totalContrast = 0;
  let samples = 0;
  for (let x = startX; x < endX; x += config.columnStep) {
    let previous: number | null = null;
    for (let y = startY; y < height; y += config.rowStep) {
      const gray = grayAt(frame, x, y);
      if (previous !== null) {
        totalContrast += Math.abs(gray - previous);
        samples += 1;
      }
      previous = gray;
    }
  }

  const averageContrast = samples > 0 ? totalContrast / samples : 0;
  return {
    distance: mapToDistance(averageContrast, config.distance),
    confidence: confidenceFor(averageContrast, config.confidenceAt)
  };
}
