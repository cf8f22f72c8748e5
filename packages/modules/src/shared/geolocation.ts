import type { LatLng } from "@pathsense/routing";

/** One-shot position fix. Resolves null when geolocation is missing or denied. */
export function getCurrentPosition(options: PositionOptions = { enableHighAccuracy: true, timeout: 10000 }): Promise<LatLng | null> {
  return new Promise((resolve) => {
    if (typeof navigator === "undefined" || !navigator.geolocation) {
      console.warn("[Geo] Geolocation not supported");
      resolve(null);
      return;
    }
    navigator.geolocation.getCurrentPosition(
      (position) => resolve({ lat: position.coords.latitude, lng: position.coords.longitude }),
      (error) => {
        console.warn("[Geo] Location unavailable:", error.message);
        resolve(null);
      },
      options
    );
  });
}
