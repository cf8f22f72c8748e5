import {
  AlertGate,
  buildCameraInstruction,
  classifyAlertZone,
  isObstacleZone,
  VIBRATION_PATTERNS,
  type AlertZone,
  type CameraAnalysisPayload,
  type Direction,
  type FrameAnalysis
} from "@pathsense/nav-core";

import { vibrate } from "../shared/haptics";
import type { VoiceManager } from "../shared/voiceManager";

export type LocalReading = {
  distance: number;
  direction: Direction;
  confidence: number;
  zone: AlertZone;
  instruction: string;
  obstacleDetected: boolean;
};

export const ZONE_STYLES: Record<AlertZone, { icon: string; background: string }> = {
  critical: { icon: "🚨", background: "#fed7d7" },
  warning: { icon: "⚠️", background: "#fed7d7" },
  caution: { icon: "⚡", background: "#fef5e7" },
  clear: { icon: "✅", background: "#f0fff4" }
};

export function describeAnalysis(analysis: FrameAnalysis, sensitivity: number): LocalReading {
  return {
    distance: analysis.distance,
    direction: analysis.direction,
    confidence: analysis.confidence,
    zone: classifyAlertZone(analysis.distance, sensitivity),
    instruction: buildCameraInstruction(analysis, sensitivity),
    obstacleDetected: analysis.distance < sensitivity
  };
}

export function toCameraPayload(reading: LocalReading, analysis: FrameAnalysis): CameraAnalysisPayload {
  return {
    distance: reading.distance,
    direction: reading.direction,
    confidence: reading.confidence,
    leftEdges: analysis.leftEdges,
    rightEdges: analysis.rightEdges,
    instruction: reading.instruction,
    obstacleDetected: reading.obstacleDetected
  };
}

export type ObstacleAlerterOptions = {
  voice: VoiceManager;
  gate?: AlertGate;
  vibrate?: (pattern: number[]) => boolean;
};

/**
 * Turns local readings into vibration and rate-limited speech. Only critical and warning zones
 * alert.
 */
export class ObstacleAlerter {
  private readonly voice: VoiceManager;
  private readonly gate: AlertGate;
  private readonly vibrate: (pattern: number[]) => boolean;

  constructor(options: ObstacleAlerterOptions) {
    this.voice = options.voice;
    this.gate = options.gate ?? new AlertGate();
    this.vibrate = options.vibrate ?? vibrate;
  }

  handle(reading: LocalReading, nowMs: number): { vibrated: boolean; spoke: boolean } {
    if (!isObstacleZone(reading.zone)) {
      return { vibrated: false, spoke: false };
    }
    const vibrated = this.vibrate(VIBRATION_PATTERNS[reading.zone]);
    const spoke =
      this.voice.isEnabled() && this.gate.shouldSpeak(reading.zone, nowMs)
        ? this.voice.speak(reading.instruction, reading.zone === "critical" ? "high" : "normal")
        : false;
    return { vibrated, spoke };
  }

  reset() {
    this.gate.reset();
  }
}
