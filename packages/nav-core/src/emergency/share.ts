import { DEFAULT_EMERGENCY_CONFIG } from "./emergencyStateMachine";
import type { GeoPoint } from "./types";

export function buildMapsUrl(location: GeoPoint): string {
  return `https://maps.google.com/?q=${location.lat},${location.lng}`;
}

export function buildLocationShareText(location: GeoPoint): string {
  return `Emergency! I need help. My location: ${buildMapsUrl(location)}`;
}

export function resolveEmergencyNumber(
  contact: string | null | undefined,
  fallback: string = DEFAULT_EMERGENCY_CONFIG.defaultEmergencyNumber
): string {
  const trimmed = contact?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : fallback;
}

export function buildCallUri(contact: string | null | undefined): string {
  return `tel:${resolveEmergencyNumber(contact).replace(/[^\d+#*]/g, "")}`;
}

export const BYSTANDER_ANNOUNCEMENT =
  "Emergency! This person needs help. Please call for assistance or help them.";
