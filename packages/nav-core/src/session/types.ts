import type { NavigationMode, NavigationReading } from "../types/reading";

export type NavigationEvent =
  | {
      type: "START";
      mode: NavigationMode;
      timestampMs: number;
    }
  | {
      type: "STOP";
      timestampMs: number;
    }
  | {
      type: "READING";
      reading: NavigationReading;
      timestampMs: number;
    }
  | {
      type: "RESET";
    };
