export type NavigationConfig = {
  demoIntervalMs: number;
  obstacleThresholdCm: number;
  demoMinDistanceCm: number;
  demoMaxDistanceCm: number;
};

export const DEFAULT_NAVIGATION_CONFIG: NavigationConfig = {
  demoIntervalMs: 2000,
  obstacleThresholdCm: 50,
  demoMinDistanceCm: 10,
  demoMaxDistanceCm: 200
};

export const STOPPED_INSTRUCTION = "Navigation stopped";
