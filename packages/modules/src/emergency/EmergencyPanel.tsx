"use client";

import {
  buildCallUri,
  buildLocationShareText,
  buildMapsUrl,
  BYSTANDER_ANNOUNCEMENT,
  DEFAULT_EMERGENCY_CONFIG,
  IDLE_EMERGENCY,
  reduceEmergency,
  resolveEmergencyNumber,
  type EmergencyConfig,
  type EmergencyEffect,
  type EmergencyEvent,
  type EmergencyState,
  type GeoPoint
} from "@pathsense/nav-core";
import { Button } from "@pathsense/ui-kit";
import { useCallback, useEffect, useRef, useState } from "react";

import { vibrate } from "../shared/haptics";
import { useWakeLock } from "../shared/useWakeLock";
import type { VoiceManager } from "../shared/voiceManager";
import { browserEmergencyActions, type EmergencyActions } from "./emergencyActions";

export const ACTIVATION_VIBRATION = [1000, 500, 1000, 500, 1000];
export const REPEAT_VIBRATION = [500, 200, 500, 200, 500];
export const CONTINUOUS_VIBRATION = [200, 100, 200, 100, 200, 500];
export const CONTINUOUS_VIBRATION_MS = 2000;
export const REPEAT_ANNOUNCEMENT = "Emergency assistance needed! Please help!";

type EmergencyPanelProps = {
  voice: VoiceManager;
  actions?: EmergencyActions;
  config?: EmergencyConfig;
  now?: () => number;
};

export function EmergencyPanel({
  voice,
  actions = browserEmergencyActions,
  config = DEFAULT_EMERGENCY_CONFIG,
  now = Date.now
}: EmergencyPanelProps) {
  const [state, setState] = useState<EmergencyState>(IDLE_EMERGENCY);
  const [contact, setContact] = useState("");
  const [bystanders, setBystanders] = useState(false);
  const [notice, setNotice] = useState<string | null>(null);
  const stateRef = useRef<EmergencyState>(IDLE_EMERGENCY);
  const contactRef = useRef("");
  const locationRef = useRef<GeoPoint | null>(null);

  contactRef.current = contact;
  useWakeLock(state.status !== "idle");

  const requestLocation = useCallback(() => {
    actions
      .locate()
      .then((location) => {
        if (location) {
          locationRef.current = location;
        }
      })
      .catch((error: unknown) => {
        console.warn("[Emergency] Location lookup failed:", error);
      });
  }, [actions]);

  const callContact = useCallback(() => {
    const number = resolveEmergencyNumber(contactRef.current, config.defaultEmergencyNumber);
    actions.call(buildCallUri(number));
    voice.speak(`Calling emergency contact: ${number}`, "high");
    setNotice(`Calling ${number}...`);
  }, [actions, config.defaultEmergencyNumber, voice]);

  const shareLocation = useCallback(() => {
    const location = locationRef.current;
    if (!location) {
      voice.speak("Location not available. Requesting location access.");
      requestLocation();
      return;
    }
    actions
      .share({ title: "Emergency Location", text: buildLocationShareText(location), url: buildMapsUrl(location) })
      .then((outcome) => {
        if (outcome === "copied") {
          setNotice("Location copied to clipboard!");
        } else if (outcome === "unavailable") {
          setNotice(buildLocationShareText(location));
        }
      })
      .catch((error: unknown) => {
        console.error("[Emergency] Share failed:", error);
      });
    voice.speak("Location shared for emergency assistance.");
  }, [actions, requestLocation, voice]);

  const alertBystanders = useCallback(() => {
    setBystanders(true);
    voice.speak(BYSTANDER_ANNOUNCEMENT, "high");
  }, [voice]);

  const runEffect = useCallback(
    (effect: EmergencyEffect) => {
      switch (effect) {
        case "call":
          callContact();
          return;
        case "share-location":
          shareLocation();
          return;
        case "alert-bystanders":
          alertBystanders();
          return;
        case "cancelled":
          setBystanders(false);
          vibrate([0]);
          voice.speak("Emergency cancelled.", "high");
          setNotice("Emergency cancelled");
          return;
      }
    },
    [alertBystanders, callContact, shareLocation, voice]
  );

  const dispatch = useCallback(
    (event: EmergencyEvent) => {
      const transition = reduceEmergency(stateRef.current, event, config);
      if (transition.state === stateRef.current) {
        return;
      }
      stateRef.current = transition.state;
      setState(transition.state);
      transition.effects.forEach(runEffect);
    },
    [config, runEffect]
  );

  const trigger = () => {
    if (stateRef.current.status !== "idle") {
      return;
    }
    dispatch({ type: "TRIGGER" });
    requestLocation();
    voice.speak("Emergency activated. Help is being called.", "high");
    vibrate(ACTIVATION_VIBRATION);
  };

  useEffect(() => {
    if (state.status !== "countdown") {
      return;
    }
    const timer = setInterval(() => dispatch({ type: "TICK", timestampMs: now() }), 1000);
    return () => clearInterval(timer);
  }, [state.status, dispatch, now]);

  useEffect(() => {
    if (state.status !== "active") {
      return;
    }
    const announce = setInterval(() => {
      voice.speak(REPEAT_ANNOUNCEMENT, "high");
      vibrate(REPEAT_VIBRATION);
    }, config.repeatAnnouncementMs);
    vibrate(CONTINUOUS_VIBRATION);
    const buzz = setInterval(() => vibrate(CONTINUOUS_VIBRATION), CONTINUOUS_VIBRATION_MS);
    return () => {
      clearInterval(announce);
      clearInterval(buzz);
    };
  }, [state.status, config.repeatAnnouncementMs, voice]);

  return (
    <div className="card">
      <div className="text-sm font-semibold">Emergency</div>
      <label className="text-xs text-gray-600 mt-2" style={{ display: "block" }}>
        Emergency contact
        <input
          type="tel"
          value={contact}
          placeholder={config.defaultEmergencyNumber}
          onChange={(event) => setContact(event.target.value)}
          style={{ display: "block", width: "100%" }}
        />
      </label>
      <div className="mt-3">
        <Button variant="danger" onClick={trigger} disabled={state.status !== "idle"}>
          🚨 Emergency
        </Button>
      </div>
      {notice && <p className="text-xs text-gray-700 mt-2">{notice}</p>}

      {state.status !== "idle" && (
        <div role="dialog" aria-modal="true" aria-label="Emergency" className="emergency-modal">
          {state.status === "countdown" ? (
            <p className="text-sm font-semibold">
              Calling for help in <span data-testid="emergency-countdown">{state.remaining}</span> seconds
            </p>
          ) : (
            <p className="text-sm font-semibold">Emergency active</p>
          )}
          <div className="mt-3" style={{ display: "flex", flexWrap: "wrap", gap: "8px" }}>
            <Button variant="danger" onClick={callContact}>
              Call now
            </Button>
            <Button variant="ghost" onClick={shareLocation}>
              Share location
            </Button>
            <Button variant="ghost" onClick={alertBystanders}>
              Alert bystanders
            </Button>
            <Button onClick={() => dispatch({ type: "CANCEL" })}>Cancel emergency</Button>
          </div>
        </div>
      )}

      {bystanders && (
        <div role="alertdialog" aria-label="Bystander alert" className="bystander-alert">
          <h1>🚨 EMERGENCY 🚨</h1>
          <p>This person needs assistance!</p>
          <p>Please help or call for help!</p>
          <Button variant="ghost" onClick={() => setBystanders(false)}>
            Close alert
          </Button>
        </div>
      )}
    </div>
  );
}
