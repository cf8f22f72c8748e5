import type { Direction } from "../types/reading";
import { type AlertZone, classifyAlertZone } from "./alertZones";

export type InstructionInput = {
  distance: number;
  direction: Direction;
  confidence?: number;
};

export const DEFAULT_CONFIDENCE = 0.5;
export const CONFIDENT_ABOVE = 0.7;

export function buildZoneInstruction(zone: AlertZone, input: InstructionInput): string {
  const { distance, direction } = input;
  const confidence = input.confidence ?? DEFAULT_CONFIDENCE;

  switch (zone) {
    case "critical":
      return confidence > CONFIDENT_ABOVE
        ? `STOP! Turn ${direction} immediately!`
        : `Caution! Obstacle detected - turn ${direction}`;
    case "warning":
      return direction === "straight"
        ? "Obstacle ahead - slow down and prepare to navigate"
        : `Obstacle ahead - prepare to turn ${direction}`;
    case "caution":
      return `Caution - obstacle at ${Math.round(distance)}cm ahead`;
    case "clear":
      return direction === "straight"
        ? "Path is clear - safe to continue straight"
        : "Path is clear - continue forward";
  }
}

export function buildCameraInstruction(input: InstructionInput, sensitivity: number): string {
  return buildZoneInstruction(classifyAlertZone(input.distance, sensitivity), input);
}
