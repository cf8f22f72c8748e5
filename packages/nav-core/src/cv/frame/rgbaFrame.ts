import type { DistanceMapping } from "./config";

/**
 * Row-major RGBA pixels, the layout of `ImageData`.
 */
export type RgbaFrame = {
  data: ArrayLike<number>;
  width: number;
  height: number;
};

export type ScoredEstimate = {
  distance: number;
  confidence: number;
};

export class FrameAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameAnalysisError";
  }
}

export const MIN_FRAME_SIZE = 3;

export function assertFrame(frame: RgbaFrame): void {
  const { width, height, data } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new FrameAnalysisError(`Frame size must be integral, got ${width}x${height}`);
  }
  if (width < MIN_FRAME_SIZE || height < MIN_FRAME_SIZE) {
    throw new FrameAnalysisError(`Frame too small for analysis: ${width}x${height}`);
  }
  if (data.length < width * height * 4) {
    throw new FrameAnalysisError(
      `Frame buffer holds ${data.length} values, expected ${width * height * 4}`
    );
  }
}

export function grayAt(frame: RgbaFrame, x: number, y: number): number {
  const index = (y * frame.width + x) * 4;
  const { data } = frame;
  return ((data[index] ?? 0) + (data[index + 1] ?? 0) + (data[index + 2] ?? 0)) / 3;
}

export const clamp = (value: number, min: number, max: number) =>
  Math.min(max, Math.max(min, value));

export function mapToDistance(value: number, mapping: DistanceMapping): number {
  return clamp(mapping.base - value * mapping.scale, mapping.min, mapping.max);
}

export function confidenceFor(value: number, saturatesAt: number): number {
  return clamp(value / saturatesAt, 0, 1);
}
