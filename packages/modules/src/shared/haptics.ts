export function vibrate(pattern: number[]): boolean {
  if (pattern.length === 0 || typeof navigator === "undefined" || !("vibrate" in navigator)) {
    return false;
  }
  return navigator.vibrate(pattern);
}
