import type {
  EmergencyConfig,
  EmergencyEffect,
  EmergencyEvent,
  EmergencyState,
  EmergencyTransition
} from "./types";

export const DEFAULT_EMERGENCY_CONFIG: EmergencyConfig = {
  countdownSeconds: 10,
  repeatAnnouncementMs: 10000,
  defaultEmergencyNumber: "100"
};

export const ACTIVATION_EFFECTS: readonly EmergencyEffect[] = [
  "call",
  "share-location",
  "alert-bystanders"
];

export const IDLE_EMERGENCY: EmergencyState = { status: "idle" };

function unchanged(state: EmergencyState): EmergencyTransition {
  return { state, effects: [] };
}

export function reduceEmergency(
  state: EmergencyState,
  event: EmergencyEvent,
  config: EmergencyConfig = DEFAULT_EMERGENCY_CONFIG
): EmergencyTransition {
  switch (event.type) {
    case "TRIGGER":
      if (state.status !== "idle") {
        return unchanged(state);
      }
      return {
        state: { status: "countdown", remaining: Math.max(1, Math.floor(config.countdownSeconds)) },
        effects: []
      };

    case "TICK": {
      if (state.status !== "countdown") {
        return unchanged(state);
      }
      const remaining = state.remaining - 1;
      if (remaining > 0) {
        return { state: { status: "countdown", remaining }, effects: [] };
      }
      return {
        state: { status: "active", activatedAtMs: event.timestampMs },
        effects: [...ACTIVATION_EFFECTS]
      };
    }

    case "CANCEL":
      if (state.status === "idle") {
        return unchanged(state);
      }
      return { state: IDLE_EMERGENCY, effects: ["cancelled"] };
  }
}
