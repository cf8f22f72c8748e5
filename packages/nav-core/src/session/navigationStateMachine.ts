import type { NavigationState } from "../types/reading";
import { DEFAULT_NAVIGATION_CONFIG, type NavigationConfig, STOPPED_INSTRUCTION } from "./config";
import type { NavigationEvent } from "./types";

export function createInitialNavigationState(): NavigationState {
  return {
    isRunning: false,
    mode: "demo",
    distance: 0,
    direction: "",
    lastInstruction: "",
    obstacleDetected: false,
    confidence: null,
    updatedAt: null
  };
}

export function reduceNavigation(
  state: NavigationState,
  event: NavigationEvent,
  config: NavigationConfig = DEFAULT_NAVIGATION_CONFIG
): NavigationState {
  if (event.type === "RESET") {
    return createInitialNavigationState();
  }

  if (event.type === "START") {
    if (state.isRunning && state.mode === event.mode) {
      return state;
    }
    return {
      ...state,
      isRunning: true,
      mode: event.mode,
      updatedAt: event.timestampMs
    };
  }

  if (event.type === "STOP") {
    return {
      ...state,
      isRunning: false,
      lastInstruction: STOPPED_INSTRUCTION,
      updatedAt: event.timestampMs
    };
  }

  if (!state.isRunning) {
    return state;
  }

  const { reading } = event;
  return {
    ...state,
    distance: reading.distance,
    direction: reading.direction,
    lastInstruction: reading.instruction,
    obstacleDetected: reading.obstacleDetected ?? reading.distance < config.obstacleThresholdCm,
    confidence: reading.confidence ?? null,
    updatedAt: event.timestampMs
  };
}
