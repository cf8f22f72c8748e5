import { describe, expect, it } from "vitest";

import { DEFAULT_EMERGENCY_CONFIG, IDLE_EMERGENCY, reduceEmergency } from "./emergencyStateMachine";
import {
  buildCallUri,
  buildLocationShareText,
  buildMapsUrl,
  resolveEmergencyNumber
} from "./share";
import type { EmergencyState } from "./types";

describe("reduceEmergency", () => {
  it("starts the countdown from idle", () => {
    const { state, effects } = reduceEmergency(IDLE_EMERGENCY, { type: "TRIGGER" });

    expect(state).toEqual({ status: "countdown", remaining: 10 });
    expect(effects).toEqual([]);
  });

  it("ignores a second trigger during the countdown", () => {
    const countdown: EmergencyState = { status: "countdown", remaining: 4 };

    expect(reduceEmergency(countdown, { type: "TRIGGER" }).state).toBe(countdown);
  });

  it("activates with call, share and bystander effects when the countdown ends", () => {
    const config = { ...DEFAULT_EMERGENCY_CONFIG, countdownSeconds: 2 };
    let transition = reduceEmergency(IDLE_EMERGENCY, { type: "TRIGGER" }, config);
    transition = reduceEmergency(transition.state, { type: "TICK", timestampMs: 1000 }, config);

    expect(transition.state).toEqual({ status: "countdown", remaining: 1 });

    transition = reduceEmergency(transition.state, { type: "TICK", timestampMs: 2000 }, config);

    expect(transition.state).toEqual({ status: "active", activatedAtMs: 2000 });
    expect(transition.effects).toEqual(["call", "share-location", "alert-bystanders"]);
  });

  it("ignores ticks outside the countdown", () => {
    const active: EmergencyState = { status: "active", activatedAtMs: 5 };

    expect(reduceEmergency(active, { type: "TICK", timestampMs: 10 })).toEqual({
      state: active,
      effects: []
    });
  });

  it("cancels from countdown or active, but not from idle", () => {
    expect(reduceEmergency({ status: "countdown", remaining: 3 }, { type: "CANCEL" })).toEqual({
      state: { status: "idle" },
      effects: ["cancelled"]
    });
    expect(reduceEmergency({ status: "active", activatedAtMs: 1 }, { type: "CANCEL" }).effects).toEqual([
      "cancelled"
    ]);
    expect(reduceEmergency(IDLE_EMERGENCY, { type: "CANCEL" }).effects).toEqual([]);
  });
});

describe("emergency sharing", () => {
  const location = { lat: 27.7172, lng: 85.324 };

  it("builds a maps link and share text", () => {
    expect(buildMapsUrl(location)).toBe("https://maps.google.com/?q=27.7172,85.324");
    expect(buildLocationShareText(location)).toBe(
      "Emergency! I need help. My location: https://maps.google.com/?q=27.7172,85.324"
    );
  });

  it("falls back to the default number for blank contacts", () => {
    expect(resolveEmergencyNumber("  ")).toBe("100");
    expect(resolveEmergencyNumber(undefined)).toBe("100");
    expect(resolveEmergencyNumber(" 9800000000 ")).toBe("9800000000");
  });

  it("strips formatting from the dialled number", () => {
    expect(buildCallUri("+977 (1) 555-0100")).toBe("tel:+97715550100");
    expect(buildCallUri("")).toBe("tel:100");
  });
});
