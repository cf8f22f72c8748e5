export type AlertZone = "critical" | "warning" | "caution" | "clear";

export type Proximity = "near" | "approaching" | "far";

export const MIN_SENSITIVITY_CM = 20;
export const MAX_SENSITIVITY_CM = 200;
export const DEFAULT_SENSITIVITY_CM = 50;

export const CRITICAL_FRACTION = 0.6;
export const CAUTION_FRACTION = 1.5;

export function clampSensitivity(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_SENSITIVITY_CM;
  }
  return Math.min(MAX_SENSITIVITY_CM, Math.max(MIN_SENSITIVITY_CM, Math.round(value)));
}

/**
 * Zones scale with the user's sensitivity, the distance at which an obstacle starts to matter.
 */
export function classifyAlertZone(distance: number, sensitivity: number): AlertZone {
  if (distance < sensitivity * CRITICAL_FRACTION) {
    return "critical";
  }
  if (distance < sensitivity) {
    return "warning";
  }
  if (distance < sensitivity * CAUTION_FRACTION) {
    return "caution";
  }
  return "clear";
}

export function isObstacleZone(zone: AlertZone): boolean {
  return zone === "critical" || zone === "warning";
}

// Fixed bands used by the demo console, where readings carry no sensitivity.
export function classifyProximity(distance: number): Proximity {
  if (distance < 50) {
    return "near";
  }
  if (distance < 100) {
    return "approaching";
  }
  return "far";
}

export const VIBRATION_PATTERNS: Record<AlertZone, number[]> = {
  critical: [300, 150, 300, 150, 300],
  warning: [200, 100, 200],
  caution: [],
  clear: []
};
