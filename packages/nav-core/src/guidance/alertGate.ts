import type { AlertZone } from "./alertZones";

export type AlertGateConfig = {
  criticalCooldownMs: number;
  warningCooldownMs: number;
};

export const DEFAULT_ALERT_GATE_CONFIG: AlertGateConfig = {
  criticalCooldownMs: 2000,
  warningCooldownMs: 3000
};

/**
 * Rate-limits spoken obstacle alerts. Critical and warning alerts keep separate clocks so a
 * critical alert is never held back by a recent warning.
 */
export class AlertGate {
  private readonly config: AlertGateConfig;
  private lastCriticalAt: number | null = null;
  private lastWarningAt: number | null = null;

  constructor(config: AlertGateConfig = DEFAULT_ALERT_GATE_CONFIG) {
    this.config = config;
  }

  shouldSpeak(zone: AlertZone, nowMs: number): boolean {
    if (zone === "critical") {
      if (this.lastCriticalAt !== null && nowMs - this.lastCriticalAt <= this.config.criticalCooldownMs) {
        return false;
      }
      this.lastCriticalAt = nowMs;
      return true;
    }

    if (zone === "warning") {
      if (this.lastWarningAt !== null && nowMs - this.lastWarningAt <= this.config.warningCooldownMs) {
        return false;
      }
      this.lastWarningAt = nowMs;
      return true;
    }

    return false;
  }

  reset(): void {
    this.lastCriticalAt = null;
    this.lastWarningAt = null;
  }
}
