import type { AccessibilityRating } from "./types";

export const ACCESSIBILITY_LABELS: Record<AccessibilityRating, string> = {
  good: "Fully Accessible",
  limited: "Partially Accessible",
  poor: "Not Accessible",
  unknown: "Unknown"
};

export const ROUTE_COLORS: Record<AccessibilityRating, string> = {
  good: "#28a745",
  limited: "#ffc107",
  poor: "#dc3545",
  unknown: "#2c5aa0"
};

export function accessibilityLabel(rating: string): string {
  return isAccessibilityRating(rating) ? ACCESSIBILITY_LABELS[rating] : ACCESSIBILITY_LABELS.unknown;
}

export function isAccessibilityRating(value: string): value is AccessibilityRating {
  return value === "good" || value === "limited" || value === "poor" || value === "unknown";
}

export function instructionIcon(text: string): string {
  const lower = text.toLowerCase();
  if (lower.includes("left")) {
    return "↰";
  }
  if (lower.includes("right")) {
    return "↱";
  }
  if (lower.includes("straight") || lower.includes("continue")) {
    return "↑";
  }
  if (lower.includes("arrive")) {
    return "🏁";
  }
  return "➤";
}

export function formatDistance(meters: number): string {
  return meters >= 1000 ? `${(meters / 1000).toFixed(1)} km` : `${Math.round(meters)} m`;
}

export function formatDuration(seconds: number): string {
  const minutes = Math.round(seconds / 60);
  if (minutes < 60) {
    return `${minutes} min`;
  }
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest === 0 ? `${hours} h` : `${hours} h ${rest} min`;
}
