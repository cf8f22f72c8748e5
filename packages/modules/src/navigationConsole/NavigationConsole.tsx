"use client";

import { classifyProximity, type NavigationState, type Proximity } from "@pathsense/nav-core";
import { Button } from "@pathsense/ui-kit";
import { useCallback, useEffect, useMemo, useRef, useState } from "react";

import { type SocketFactory, useNavigationSocket } from "../shared/useNavigationSocket";
import { VoiceManager } from "../shared/voiceManager";

export type ConsoleAlert = {
  message: string;
  kind: "info" | "obstacle";
};

export const ALERT_HIDE_MS = 3000;

export const PROXIMITY_COLORS: Record<Proximity, string> = {
  near: "#e53e3e",
  approaching: "#ed8936",
  far: "#667eea"
};

type NavigationConsoleProps = {
  socketUrl?: string;
  connect?: SocketFactory;
  voice?: VoiceManager;
};

/**
 * Dashboard for the server's demo readings. Ctrl+S toggles navigation.
 */
export function NavigationConsole({ socketUrl, connect, voice }: NavigationConsoleProps) {
  const voiceManager = useMemo(() => voice ?? new VoiceManager(), [voice]);
  const [alert, setAlert] = useState<ConsoleAlert | null>(null);
  const hideTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const showAlert = useCallback((next: ConsoleAlert) => {
    if (hideTimerRef.current) {
      clearTimeout(hideTimerRef.current);
      hideTimerRef.current = null;
    }
    setAlert(next);
    if (next.kind !== "obstacle") {
      hideTimerRef.current = setTimeout(() => {
        hideTimerRef.current = null;
        setAlert(null);
      }, ALERT_HIDE_MS);
    }
  }, []);

  useEffect(
    () => () => {
      if (hideTimerRef.current) {
        clearTimeout(hideTimerRef.current);
      }
    },
    []
  );

  const listeners = useMemo(
    () => ({
      onStarted: (message: string) => {
        showAlert({ message: "Navigation started successfully", kind: "info" });
        voiceManager.speak(message, "high");
      },
      onStopped: (message: string) => {
        showAlert({ message: "Navigation stopped", kind: "info" });
        voiceManager.speak(message, "high");
      },
      onUpdate: (update: NavigationState) => {
        if (update.isRunning && update.obstacleDetected) {
          showAlert({ message: `Obstacle detected! ${update.lastInstruction}`, kind: "obstacle" });
          voiceManager.speak(update.lastInstruction);
        }
      }
    }),
    [showAlert, voiceManager]
  );

  const { status, state, error, start, stop } = useNavigationSocket({ url: socketUrl, connect, listeners });
  const running = state.isRunning;

  useEffect(() => {
    if (status === "connected") {
      showAlert({ message: "Connected to navigation system", kind: "info" });
    }
  }, [status, showAlert]);

  useEffect(() => {
    const handler = (event: KeyboardEvent) => {
      if (event.ctrlKey && event.key.toLowerCase() === "s") {
        event.preventDefault();
        if (running) {
          stop();
        } else {
          start("demo");
        }
      }
    };
    document.addEventListener("keydown", handler);
    return () => document.removeEventListener("keydown", handler);
  }, [running, start, stop]);

  const proximity = classifyProximity(state.distance);
  const statusLabel =
    status !== "connected" ? "Disconnected" : running ? "Navigation Active" : "Navigation Stopped";

  return (
    <div className="card">
      <div style={{ display: "flex", alignItems: "center", gap: "8px" }}>
        <span
          aria-hidden="true"
          className={`status-light ${running ? "running" : "stopped"}`}
          style={{
            width: "12px",
            height: "12px",
            borderRadius: "50%",
            background: running ? "var(--color-moss)" : "var(--color-slate)"
          }}
        />
        <span className="text-sm font-semibold" data-testid="status-text">
          {statusLabel}
        </span>
      </div>

      <div className="mt-3" aria-live="polite">
        <div className="text-xs text-gray-600">Distance to obstacle</div>
        <div
          data-testid="distance-value"
          data-proximity={proximity}
          style={{ fontSize: "2.5rem", fontWeight: 700, color: PROXIMITY_COLORS[proximity] }}
        >
          {state.distance} cm
        </div>
        <p
          data-testid="instruction-text"
          className={`text-sm mt-2 ${state.obstacleDetected ? "text-red-600" : "text-gray-700"}`}
        >
          {state.lastInstruction || "Press start to begin navigation"}
        </p>
      </div>

      <div className="mt-3" style={{ display: "flex", gap: "8px" }}>
        <Button onClick={() => start("demo")} disabled={running || status !== "connected"}>
          Start navigation
        </Button>
        <Button variant="danger" onClick={stop} disabled={!running}>
          Stop navigation
        </Button>
      </div>

      {alert && (
        <div role="alert" className={`alert-box ${alert.kind} mt-3`}>
          {alert.message}
        </div>
      )}
      {error && <p className="text-xs text-red-600 mt-2">{error}</p>}
      <p className="text-xs text-gray-500 mt-3">Shortcut: Ctrl+S starts or stops navigation.</p>
    </div>
  );
}
