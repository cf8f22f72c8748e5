export type Direction = "left" | "right" | "straight";

export type NavigationMode = "demo" | "camera";

/**
 * One obstacle estimate. `distance` is in centimetres.
 */
export type NavigationReading = {
  distance: number;
  direction: Direction;
  instruction: string;
  obstacleDetected?: boolean;
  confidence?: number;
};

export type NavigationState = {
  isRunning: boolean;
  mode: NavigationMode;
  distance: number;
  direction: Direction | "";
  lastInstruction: string;
  obstacleDetected: boolean;
  confidence: number | null;
  updatedAt: number | null;
};
