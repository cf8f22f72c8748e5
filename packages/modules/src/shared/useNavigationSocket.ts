"use client";

import {
  createInitialNavigationState,
  navigationStateSchema,
  type CameraAnalysisPayload,
  type ClientToServerEvents,
  type NavigationMode,
  type NavigationState,
  type ServerToClientEvents
} from "@pathsense/nav-core";
import { useCallback, useEffect, useRef, useState } from "react";
import { io, type Socket } from "socket.io-client";

export type NavigationSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

export type ConnectionStatus = "connecting" | "connected" | "disconnected";

export type SocketFactory = (url: string | undefined) => NavigationSocket;

export type NavigationSocketListeners = {
  onStarted?: (message: string, mode: NavigationMode) => void;
  onStopped?: (message: string) => void;
  onUpdate?: (state: NavigationState) => void;
};

export type NavigationSocketOptions = {
  /** Relay server origin. Defaults to the page's own origin. */
  url?: string;
  connect?: SocketFactory;
  listeners?: NavigationSocketListeners;
};

const defaultFactory: SocketFactory = (url) =>
  url ? io(url, { transports: ["websocket", "polling"] }) : io({ transports: ["websocket", "polling"] });

export function useNavigationSocket(options: NavigationSocketOptions = {}) {
  const { url, connect = defaultFactory } = options;
  const socketRef = useRef<NavigationSocket | null>(null);
  const connectRef = useRef(connect);
  const listenersRef = useRef<NavigationSocketListeners>({});
  connectRef.current = connect;
  listenersRef.current = options.listeners ?? {};
  const [status, setStatus] = useState<ConnectionStatus>("connecting");
  const [state, setState] = useState<NavigationState>(createInitialNavigationState);
  const [lastMessage, setLastMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const socket = connectRef.current(url);
    socketRef.current = socket;
    setStatus("connecting");

    socket.on("connect", () => {
      setStatus("connected");
      setError(null);
    });
    socket.on("disconnect", () => setStatus("disconnected"));
    socket.on("connect_error", (connectError) => {
      console.warn("[Socket] connect failed:", connectError.message);
      setStatus("disconnected");
    });

    socket.on("connected", ({ message }) => setLastMessage(message));
    socket.on("navigation_started", ({ message, mode }) => {
      setLastMessage(message);
      setError(null);
      listenersRef.current.onStarted?.(message, mode);
    });
    socket.on("navigation_stopped", ({ message }) => {
      setLastMessage(message);
      listenersRef.current.onStopped?.(message);
    });
    socket.on("navigation_error", (payload) => setError(payload.message));
    socket.on("navigation_update", (update) => {
      const parsed = navigationStateSchema.safeParse(update);
      if (!parsed.success) {
        console.warn("[Socket] ignoring malformed update");
        return;
      }
      setState(parsed.data);
      listenersRef.current.onUpdate?.(parsed.data);
    });

    return () => {
      socket.off();
      socket.disconnect();
      socketRef.current = null;
    };
  }, [url]);

  const start = useCallback((mode: NavigationMode = "demo") => {
    socketRef.current?.emit("start_navigation", { mode });
  }, []);

  const stop = useCallback(() => {
    socketRef.current?.emit("stop_navigation");
  }, []);

  const sendCameraAnalysis = useCallback((payload: CameraAnalysisPayload) => {
    socketRef.current?.emit("camera_analysis", payload);
  }, []);

  return { status, state, lastMessage, error, start, stop, sendCameraAnalysis };
}
