"use client";

import {
  clampSensitivity,
  DEFAULT_SENSITIVITY_CM,
  EmaFilter,
  FrameAnalyzer,
  MAX_SENSITIVITY_CM,
  MIN_SENSITIVITY_CM,
  type RgbaFrame
} from "@pathsense/nav-core";
import { Button } from "@pathsense/ui-kit";
import { useEffect, useMemo, useRef, useState } from "react";

import { EmergencyPanel } from "../emergency/EmergencyPanel";
import type { EmergencyActions } from "../emergency/emergencyActions";
import { captureFrame } from "../shared/frameCapture";
import { useCamera } from "../shared/useCamera";
import { type SocketFactory, useNavigationSocket } from "../shared/useNavigationSocket";
import { useWakeLock } from "../shared/useWakeLock";
import { VoiceManager } from "../shared/voiceManager";
import {
  describeAnalysis,
  type LocalReading,
  ObstacleAlerter,
  toCameraPayload,
  ZONE_STYLES
} from "./obstacleGuidance";

export const ANALYSIS_INTERVAL_MS = 150;
const CONFIDENCE_SMOOTHING = 0.3;

type ObstacleNavigatorProps = {
  socketUrl?: string;
  connect?: SocketFactory;
  voice?: VoiceManager;
  emergencyActions?: EmergencyActions;
  grabFrame?: (video: HTMLVideoElement, canvas: HTMLCanvasElement) => RgbaFrame | null;
};

export function ObstacleNavigator({
  socketUrl,
  connect,
  voice,
  emergencyActions,
  grabFrame = captureFrame
}: ObstacleNavigatorProps) {
  const voiceManager = useMemo(() => voice ?? new VoiceManager(), [voice]);
  const analyzer = useMemo(() => new FrameAnalyzer(), []);
  const confidenceFilter = useMemo(() => new EmaFilter(CONFIDENCE_SMOOTHING), []);
  const alerter = useMemo(() => new ObstacleAlerter({ voice: voiceManager }), [voiceManager]);

  const videoRef = useRef<HTMLVideoElement>(null);
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const [cameraOn, setCameraOn] = useState(false);
  const [voiceEnabled, setVoiceEnabled] = useState(voiceManager.isEnabled());
  const [sensitivity, setSensitivity] = useState(DEFAULT_SENSITIVITY_CM);
  const [reading, setReading] = useState<LocalReading | null>(null);
  const [confidence, setConfidence] = useState<number | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  const camera = useCamera(videoRef, cameraOn);
  const { status, state, error, start, stop, sendCameraAnalysis } = useNavigationSocket({
    url: socketUrl,
    connect
  });
  const running = state.isRunning && state.mode === "camera";
  const cameraReady = camera.status === "ready";

  useWakeLock(running);

  const sensitivityRef = useRef(sensitivity);
  sensitivityRef.current = sensitivity;

  useEffect(() => {
    if (!running || !cameraReady) {
      return;
    }
    analyzer.reset();
    alerter.reset();
    confidenceFilter.reset();

    const timer = setInterval(() => {
      const video = videoRef.current;
      const canvas = canvasRef.current;
      if (!video || !canvas) {
        return;
      }
      const frame = grabFrame(video, canvas);
      if (!frame) {
        return;
      }
      try {
        const analysis = analyzer.analyze(frame);
        const next = describeAnalysis(analysis, sensitivityRef.current);
        sendCameraAnalysis(toCameraPayload(next, analysis));
        setReading(next);
        setConfidence(confidenceFilter.update(next.confidence));
        alerter.handle(next, Date.now());
      } catch (analysisError) {
        console.warn("[Navigator] Frame analysis failed:", analysisError);
      }
    }, ANALYSIS_INTERVAL_MS);

    return () => clearInterval(timer);
  }, [running, cameraReady, analyzer, alerter, confidenceFilter, grabFrame, sendCameraAnalysis]);

  const toggleVoice = () => {
    const next = !voiceEnabled;
    voiceManager.setEnabled(next);
    setVoiceEnabled(next);
    setNotice(next ? "Voice guidance enabled" : "Voice guidance disabled");
  };

  const startNavigation = () => {
    if (!cameraReady) {
      setNotice("Please enable camera first");
      return;
    }
    start("camera");
  };

  const statusLabel = running
    ? "Navigation Active"
    : cameraReady
      ? "Camera Active"
      : status === "connected"
        ? "Ready"
        : "Disconnected";
  const zoneStyle = reading ? ZONE_STYLES[reading.zone] : null;

  return (
    <div className="grid">
      <div className="card">
        <div className="text-sm font-semibold" data-testid="navigator-status">
          {statusLabel}
        </div>
        <div className="relative w-full mt-3">
          <video ref={videoRef} className="w-full rounded-lg bg-black" playsInline muted />
          <canvas ref={canvasRef} style={{ display: "none" }} />
        </div>
        {camera.status === "error" && <p className="text-xs text-red-600">{camera.error}</p>}

        <div
          className="mt-3"
          aria-live="assertive"
          data-zone={reading?.zone ?? "none"}
          style={{ padding: "12px", borderRadius: "12px", background: zoneStyle?.background ?? "transparent" }}
        >
          <div style={{ fontSize: "2rem", fontWeight: 700 }}>
            {zoneStyle?.icon} <span data-testid="navigator-distance">{reading ? reading.distance : "--"}</span> cm
          </div>
          <p className={`text-sm ${reading?.obstacleDetected ? "text-red-600" : "text-gray-700"}`}>
            {reading?.instruction ?? "Enable the camera, then start navigation."}
          </p>
          {confidence !== null && (
            <p className="text-xs text-gray-600">
              Confidence <span data-testid="navigator-confidence">{Math.round(confidence * 100)}%</span>
            </p>
          )}
        </div>

        <div className="mt-3" style={{ display: "flex", flexWrap: "wrap", gap: "8px" }}>
          <Button variant="ghost" onClick={() => setCameraOn((on) => !on)} disabled={running}>
            {cameraOn ? "📹 Stop Camera" : "📹 Enable Camera"}
          </Button>
          <Button onClick={startNavigation} disabled={running}>
            Start
          </Button>
          <Button variant="danger" onClick={stop} disabled={!running}>
            Stop
          </Button>
          <Button variant="ghost" pressed={voiceEnabled} onClick={toggleVoice}>
            Voice guidance
          </Button>
        </div>

        <label className="text-xs text-gray-600 mt-3" style={{ display: "block" }}>
          Sensitivity <span data-testid="sensitivity-value">{sensitivity}cm</span>
          <input
            type="range"
            min={MIN_SENSITIVITY_CM}
            max={MAX_SENSITIVITY_CM}
            step={10}
            value={sensitivity}
            aria-label="Sensitivity"
            onChange={(event) => setSensitivity(clampSensitivity(Number(event.target.value)))}
            style={{ display: "block", width: "100%" }}
          />
        </label>

        {notice && <p className="text-xs text-gray-700 mt-2">{notice}</p>}
        {error && <p className="text-xs text-red-600 mt-2">{error}</p>}
      </div>

      <EmergencyPanel voice={voiceManager} actions={emergencyActions} />
    </div>
  );
}
