import type { NavigationState } from "@pathsense/nav-core";
import { io } from "socket.io-client";

import type { NavigationSocket } from "./useNavigationSocket";

/**
 * A client socket that never opens a connection. Tests drive it by calling its registered
 * listeners and spying on `emit`.
 */
export function createIdleSocket(): NavigationSocket {
  return io("http://localhost:5000", { autoConnect: false, forceNew: true });
}

export function fireConnect(socket: NavigationSocket) {
  socket.listeners("connect").forEach((listener) => listener());
}

export function fireUpdate(socket: NavigationSocket, state: NavigationState) {
  socket.listeners("navigation_update").forEach((listener) => listener(state));
}

export function fireStarted(socket: NavigationSocket, message: string) {
  socket.listeners("navigation_started").forEach((listener) => listener({ message, mode: "demo" }));
}

export function fireError(socket: NavigationSocket, error: string, message: string) {
  socket.listeners("navigation_error").forEach((listener) => listener({ error, message }));
}

export const runningState = (overrides: Partial<NavigationState> = {}): NavigationState => ({
  isRunning: true,
  mode: "demo",
  distance: 150,
  direction: "straight",
  lastInstruction: "Path is clear",
  obstacleDetected: false,
  confidence: null,
  updatedAt: 1000,
  ...overrides
});
