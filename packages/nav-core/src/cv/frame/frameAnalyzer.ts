import type { Direction } from "../../types/reading";
import { WeightedMovingAverage } from "../filters/weightedMovingAverage";
import { analyzeContrast } from "./contrast";
import { analyzeEdges } from "./edges";
import { DEFAULT_FRAME_ANALYSIS_CONFIG, type FrameAnalysisConfig } from "./config";
import { chooseDirection, combineEstimates } from "./fusion";
import { analyzeGroundPlane } from "./groundPlane";
import { assertFrame, type RgbaFrame } from "./rgbaFrame";
import { analyzeTexture } from "./texture";

export type FrameAnalysis = {
  /** Smoothed, rounded distance in centimetres. */
  distance: number;
  rawDistance: number;
  direction: Direction;
  confidence: number;
  leftEdges: number;
  rightEdges: number;
};

export class FrameAnalyzer {
  private readonly config: FrameAnalysisConfig;
  private readonly smoother: WeightedMovingAverage;

  constructor(config: FrameAnalysisConfig = DEFAULT_FRAME_ANALYSIS_CONFIG) {
    this.config = config;
    this.smoother = new WeightedMovingAverage(config.smoothingWindow);
  }

  analyze(frame: RgbaFrame): FrameAnalysis {
    assertFrame(frame);
    const { config } = this;

    const edges = analyzeEdges(frame, config.edges);
    const texture = analyzeTexture(frame, config.texture);
    const contrast = analyzeContrast(frame, config.contrast);
    const ground = analyzeGroundPlane(frame, config.ground);

    const combined = combineEstimates(
      [
        { ...edges, weight: config.weights.edges },
        { ...texture, weight: config.weights.texture },
        { ...contrast, weight: config.weights.contrast },
        { ...ground, weight: config.weights.ground }
      ],
      config.fallbackDistanceCm
    );

    return {
      distance: Math.round(this.smoother.update(combined.distance)),
      rawDistance: combined.distance,
      direction: chooseDirection(edges.leftEdges, edges.rightEdges, config.direction),
      confidence: combined.confidence,
      leftEdges: edges.leftEdges,
      rightEdges: edges.rightEdges
    };
  }

  reset(): void {
    this.smoother.reset();
  }
}
