import { describe, expect, it } from "vitest";

import type { NavigationState } from "../types/reading";
import { DEFAULT_NAVIGATION_CONFIG, STOPPED_INSTRUCTION } from "./config";
import { createInitialNavigationState, reduceNavigation } from "./navigationStateMachine";

describe("navigationStateMachine", () => {
  it("ignores readings while stopped", () => {
    const state = createInitialNavigationState();
    const next = reduceNavigation(state, {
      type: "READING",
      timestampMs: 10,
      reading: { distance: 20, direction: "left", instruction: "Turn left now" }
    });

    expect(next).toBe(state);
  });

  it("applies readings after start and flags close obstacles", () => {
    let state: NavigationState = createInitialNavigationState();
    state = reduceNavigation(state, { type: "START", mode: "demo", timestampMs: 5 });
    state = reduceNavigation(state, {
      type: "READING",
      timestampMs: 10,
      reading: { distance: 30, direction: "right", instruction: "Turn right now" }
    });

    expect(state).toEqual({
      isRunning: true,
      mode: "demo",
      distance: 30,
      direction: "right",
      lastInstruction: "Turn right now",
      obstacleDetected: true,
      confidence: null,
      updatedAt: 10
    });
  });

  it("treats the threshold distance itself as clear", () => {
    let state: NavigationState = createInitialNavigationState();
    state = reduceNavigation(state, { type: "START", mode: "demo", timestampMs: 0 });
    state = reduceNavigation(state, {
      type: "READING",
      timestampMs: 1,
      reading: {
        distance: DEFAULT_NAVIGATION_CONFIG.obstacleThresholdCm,
        direction: "left",
        instruction: "Path is clear"
      }
    });

    expect(state.obstacleDetected).toBe(false);
  });

  it("keeps the obstacle flag a camera reading carries", () => {
    let state: NavigationState = createInitialNavigationState();
    state = reduceNavigation(state, { type: "START", mode: "camera", timestampMs: 0 });
    state = reduceNavigation(state, {
      type: "READING",
      timestampMs: 1,
      reading: {
        distance: 90,
        direction: "straight",
        instruction: "Obstacle ahead - slow down and prepare to navigate",
        obstacleDetected: true,
        confidence: 0.4
      }
    });

    expect(state.obstacleDetected).toBe(true);
    expect(state.confidence).toBe(0.4);
    expect(state.mode).toBe("camera");
  });

  it("keeps the last reading when started twice and switches mode", () => {
    let state: NavigationState = createInitialNavigationState();
    state = reduceNavigation(state, { type: "START", mode: "demo", timestampMs: 0 });
    state = reduceNavigation(state, {
      type: "READING",
      timestampMs: 1,
      reading: { distance: 120, direction: "left", instruction: "Path is clear" }
    });

    const same = reduceNavigation(state, { type: "START", mode: "demo", timestampMs: 2 });
    expect(same).toBe(state);

    const switched = reduceNavigation(state, { type: "START", mode: "camera", timestampMs: 3 });
    expect(switched.mode).toBe("camera");
    expect(switched.distance).toBe(120);
  });

  it("reports the stop instruction and resets", () => {
    let state: NavigationState = createInitialNavigationState();
    state = reduceNavigation(state, { type: "START", mode: "demo", timestampMs: 0 });
    state = reduceNavigation(state, { type: "STOP", timestampMs: 4 });

    expect(state.isRunning).toBe(false);
    expect(state.lastInstruction).toBe(STOPPED_INSTRUCTION);

    expect(reduceNavigation(state, { type: "RESET" })).toEqual(createInitialNavigationState());
  });
});
