import { DEFAULT_FRAME_ANALYSIS_CONFIG, type FrameAnalysisConfig } from "./config";
import { confidenceFor, grayAt, mapToDistance, type RgbaFrame, type ScoredEstimate } from "./rgbaFrame";

export function blockVariance(
  frame: RgbaFrame,
  startX: number,
  startY: number,
  blockSize: number
): number {
  let sum = 0;
  let sumSquares = 0;
  let count = 0;

  for (let y = startY; y < startY + blockSize; y += 1) {
    for (let x = startX; x < startX + blockSize; x += 1) {
      const gray = grayAt(frame, x, y);
      sum += gray;
      sumSquares += gray * gray;
      count += 1;
    }
  }

  if (count === 0) {
    return 0;
  }
  const mean = sum / count;
  return sumSquares / count - mean * mean;
}

/**
 * Busier texture near the bottom of the frame reads as a closer surface.
 */
export function analyzeTexture(
  frame: RgbaFrame,
  config: FrameAnalysisConfig["texture"] = DEFAULT_FRAME_ANALYSIS_CONFIG.texture
): ScoredEstimate {
  const { width, height } = frame;
  const { blockSize } = config;
  const startY = Math.floor(height * config.regionStart);

  let total = 0;
  let blocks = 0;
  for (let y = startY; y + blockSize <= height; y += blockSize) {
    for (let x = 0; x + blockSize <= width; x += blockSize) {
      total += blockVariance(frame, x, y, blockSize);
      blocks += 1;
    }
  }

  const averageVariance = blocks > 0 ? total / blocks : 0;
  return {
    distance: mapToDistance(averageVariance, config.distance),
    confidence: confidenceFor(averageVariance, config.confidenceAt)
  };
}
