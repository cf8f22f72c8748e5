export type EmergencyState =
  | { status: "idle" }
  | { status: "countdown"; remaining: number }
  | { status: "active"; activatedAtMs: number };

export type EmergencyEvent =
  | { type: "TRIGGER" }
  | { type: "TICK"; timestampMs: number }
  | { type: "CANCEL" };

export type EmergencyEffect = "call" | "share-location" | "alert-bystanders" | "cancelled";

export type EmergencyTransition = {
  state: EmergencyState;
  effects: EmergencyEffect[];
};

export type EmergencyConfig = {
  countdownSeconds: number;
  repeatAnnouncementMs: number;
  defaultEmergencyNumber: string;
};

export type GeoPoint = {
  lat: number;
  lng: number;
};
