import {
  type CameraAnalysisPayload,
  DEFAULT_NAVIGATION_CONFIG,
  type NavigationConfig,
  type NavigationEvent,
  type NavigationMode,
  type NavigationState,
  type RandomSource,
  createInitialNavigationState,
  generateDemoReading,
  reduceNavigation
} from "@pathsense/nav-core";

type Logger = Pick<Console, "info" | "warn">;

export type NavigationRelayOptions = {
  broadcast: (state: NavigationState) => void;
  config?: NavigationConfig;
  now?: () => number;
  random?: RandomSource;
  logger?: Logger;
};

/**
 * Owns the shared navigation session. Demo mode produces a reading every `demoIntervalMs`;
 * camera mode applies readings pushed by a client. At most one demo timer runs at a time.
 */
export class NavigationRelay {
  private state: NavigationState = createInitialNavigationState();
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly broadcast: (state: NavigationState) => void;
  private readonly config: NavigationConfig;
  private readonly now: () => number;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(options: NavigationRelayOptions) {
    this.broadcast = options.broadcast;
    this.config = options.config ?? DEFAULT_NAVIGATION_CONFIG;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? console;
  }

  snapshot(): NavigationState {
    return this.state;
  }

  isDemoTimerRunning(): boolean {
    return this.timer !== null;
  }

  start(mode: NavigationMode): NavigationState {
    const wasRunning = this.state.isRunning;
    this.apply({ type: "START", mode, timestampMs: this.now() });

    if (mode === "demo") {
      this.ensureTimer();
    } else {
      this.clearTimer();
    }

    this.logger.info(
      `[Relay] ${wasRunning ? "switched to" : "started"} ${mode} navigation`
    );
    this.broadcast(this.state);
    return this.state;
  }

  stop(): NavigationState {
    this.clearTimer();
    this.apply({ type: "STOP", timestampMs: this.now() });
    this.logger.info("[Relay] navigation stopped");
    this.broadcast(this.state);
    return this.state;
  }

  /** Returns false when the reading was dropped because camera navigation is not running. */
  ingestCameraReading(payload: CameraAnalysisPayload): boolean {
    if (!this.state.isRunning || this.state.mode !== "camera") {
      this.logger.warn(
        `[Relay] dropped camera reading (running=${this.state.isRunning}, mode=${this.state.mode})`
      );
      return false;
    }

    this.apply({
      type: "READING",
      timestampMs: this.now(),
      reading: {
        distance: payload.distance,
        direction: payload.direction,
        instruction: payload.instruction,
        obstacleDetected: payload.obstacleDetected,
        confidence: payload.confidence
      }
    });
    this.broadcast(this.state);
    return true;
  }

  dispose(): void {
    this.clearTimer();
  }

  private tick(): void {
    const reading = generateDemoReading(this.random, this.config);
    this.apply({ type: "READING", reading, timestampMs: this.now() });
    this.broadcast(this.state);
  }

  private apply(event: NavigationEvent): void {
    this.state = reduceNavigation(this.state, event, this.config);
  }

  private ensureTimer(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.config.demoIntervalMs);
  }

  private clearTimer(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }
}
