import type { GeoPoint } from "@pathsense/nav-core";

import { getCurrentPosition } from "../shared/geolocation";

export type ShareOutcome = "shared" | "copied" | "unavailable";

export type ShareRequest = {
  title: string;
  text: string;
  url: string;
};

/** Browser side effects of the emergency flow. */
export type EmergencyActions = {
  call(uri: string): void;
  share(request: ShareRequest): Promise<ShareOutcome>;
  locate(): Promise<GeoPoint | null>;
};

export const browserEmergencyActions: EmergencyActions = {
  call(uri) {
    window.location.href = uri;
  },

  async share(request) {
    if (typeof navigator.share === "function") {
      await navigator.share(request);
      return "shared";
    }
    if (navigator.clipboard) {
      await navigator.clipboard.writeText(request.text);
      return "copied";
    }
    return "unavailable";
  },

  locate() {
    return getCurrentPosition({ enableHighAccuracy: true, timeout: 10000, maximumAge: 300000 });
  }
};
