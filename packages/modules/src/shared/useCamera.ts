"use client";

import { type RefObject, useEffect, useState } from "react";

export type CameraState = {
  status: "idle" | "starting" | "ready" | "error";
  error?: string;
};

export const BACK_CAMERA_CONSTRAINTS: MediaStreamConstraints = {
  video: {
    facingMode: "environment",
    width: { ideal: 640 },
    height: { ideal: 480 }
  },
  audio: false
};

export const CAMERA_UNSUPPORTED = "Camera is not supported in this browser.";

const errorField = (error: unknown, field: "name" | "message"): string => {
  if (typeof error === "object" && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === "string" ? value : "";
  }
  return "";
};

// getUserMedia rejects with DOMExceptions, which are not Error instances everywhere.
export function describeCameraError(error: unknown): string {
  switch (errorField(error, "name")) {
    case "NotAllowedError":
      return "Camera permission denied. Please allow camera access and try again.";
    case "NotFoundError":
      return "No camera found on this device.";
    case "NotSupportedError":
      return CAMERA_UNSUPPORTED;
    default:
      return errorField(error, "message") || "Camera error";
  }
}

export function useCamera(videoRef: RefObject<HTMLVideoElement>, enabled: boolean) {
  const [state, setState] = useState<CameraState>({ status: "idle" });

  useEffect(() => {
    if (!enabled) {
      setState({ status: "idle" });
      return;
    }

    const video = videoRef.current;
    if (!video) {
      return;
    }
    if (typeof navigator === "undefined" || !navigator.mediaDevices?.getUserMedia) {
      setState({ status: "error", error: CAMERA_UNSUPPORTED });
      return;
    }

    let active = true;
    let stream: MediaStream | null = null;
    setState({ status: "starting" });

    navigator.mediaDevices
      .getUserMedia(BACK_CAMERA_CONSTRAINTS)
      .then((granted) => {
        if (!active) {
          granted.getTracks().forEach((track) => track.stop());
          return;
        }
        stream = granted;
        video.srcObject = granted;
        video.play().catch((error: unknown) => {
          console.warn("[Camera] autoplay blocked:", error);
        });
        setState({ status: "ready" });
      })
      .catch((error: unknown) => {
        if (active) {
          setState({ status: "error", error: describeCameraError(error) });
        }
      });

    return () => {
      active = false;
      stream?.getTracks().forEach((track) => track.stop());
      video.srcObject = null;
    };
  }, [enabled, videoRef]);

  return state;
}
