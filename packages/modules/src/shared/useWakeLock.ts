"use client";

import { useEffect } from "react";

/**
 * Keeps the screen awake while `active`. Browsers without the Screen Wake Lock API are ignored.
 */
export function useWakeLock(active: boolean) {
  useEffect(() => {
    if (!active || typeof navigator === "undefined" || !("wakeLock" in navigator)) {
      return;
    }

    let sentinel: WakeLockSentinel | null = null;
    let cancelled = false;

    navigator.wakeLock
      .request("screen")
      .then((lock) => {
        if (cancelled) {
          return lock.release();
        }
        sentinel = lock;
        return undefined;
      })
      .catch((error: unknown) => {
        console.warn("[WakeLock] request failed:", error);
      });

    return () => {
      cancelled = true;
      sentinel?.release().catch((error: unknown) => {
        console.warn("[WakeLock] release failed:", error);
      });
    };
  }, [active]);
}
