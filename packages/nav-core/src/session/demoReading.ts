import type { Direction, NavigationReading } from "../types/reading";
import { DEFAULT_NAVIGATION_CONFIG, type NavigationConfig } from "./config";

export type RandomSource = () => number;

const DEMO_DIRECTIONS: readonly Direction[] = ["left", "right"];

export const CLEAR_PATH_INSTRUCTION = "Path is clear";

export function turnInstruction(direction: Direction): string {
  return `Turn ${direction} now`;
}

/**
 * Fabricates a reading for demo mode. `random` must return values in [0, 1).
 */
export function generateDemoReading(
  random: RandomSource = Math.random,
  config: NavigationConfig = DEFAULT_NAVIGATION_CONFIG
): NavigationReading {
  const span = config.demoMaxDistanceCm - config.demoMinDistanceCm + 1;
  const distance = config.demoMinDistanceCm + Math.floor(random() * span);
  const direction = DEMO_DIRECTIONS[Math.floor(random() * DEMO_DIRECTIONS.length)] ?? "left";
  const obstacleDetected = distance < config.obstacleThresholdCm;

  return {
    distance,
    direction,
    obstacleDetected,
    instruction: obstacleDetected ? turnInstruction(direction) : CLEAR_PATH_INSTRUCTION
  };
}
