import type { NavigationMode, NavigationState } from "../types/reading";
import type { CameraAnalysisPayload, NavigationErrorPayload, StartNavigationPayload } from "./schemas";

export type ServerToClientEvents = {
  connected: (payload: { message: string }) => void;
  navigation_update: (state: NavigationState) => void;
  navigation_started: (payload: { message: string; mode: NavigationMode }) => void;
  navigation_stopped: (payload: { message: string }) => void;
  navigation_error: (payload: NavigationErrorPayload) => void;
};

export type ClientToServerEvents = {
  start_navigation: (payload?: StartNavigationPayload) => void;
  stop_navigation: () => void;
  camera_analysis: (payload: CameraAnalysisPayload) => void;
};

export const CONNECTED_MESSAGE = "Connected to navigation system";
export const STOPPED_MESSAGE = "Navigation system stopped";

export function startedMessage(mode: NavigationMode): string {
  return mode === "camera" ? "Camera navigation started" : "Navigation system started";
}
