import { DEFAULT_NAVIGATION_CONFIG, type NavigationConfig } from "@pathsense/nav-core";
import { z } from "zod";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());

const envSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(5000)),
  HOST: z.preprocess(blankToUndefined, z.string().default("0.0.0.0")),
  CORS_ORIGIN: z.preprocess(blankToUndefined, z.string().default("*")),
  DEMO_INTERVAL_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(100).default(DEFAULT_NAVIGATION_CONFIG.demoIntervalMs)
  ),
  OBSTACLE_THRESHOLD_CM: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().default(DEFAULT_NAVIGATION_CONFIG.obstacleThresholdCm)
  ),
  OPENROUTESERVICE_API_KEY: optionalString,
  BAATO_API_KEY: optionalString,
  OSRM_BASE_URL: optionalUrl,
  NOMINATIM_BASE_URL: optionalUrl,
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z.enum(["development", "production", "test"]).default("development")
  )
});

export type RoutingConfig = {
  openRouteServiceApiKey?: string;
  baatoApiKey?: string;
  osrmBaseUrl?: string;
  nominatimBaseUrl?: string;
};

export type ServerConfig = {
  port: number;
  host: string;
  corsOrigin: string;
  navigation: NavigationConfig;
  routing: RoutingConfig;
  /** Runs Next in development mode (on-demand compilation, hot reload). */
  dev: boolean;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    host: data.HOST,
    corsOrigin: data.CORS_ORIGIN,
    navigation: {
      ...DEFAULT_NAVIGATION_CONFIG,
      demoIntervalMs: data.DEMO_INTERVAL_MS,
      obstacleThresholdCm: data.OBSTACLE_THRESHOLD_CM
    },
    routing: {
      openRouteServiceApiKey: data.OPENROUTESERVICE_API_KEY,
      baatoApiKey: data.BAATO_API_KEY,
      osrmBaseUrl: data.OSRM_BASE_URL,
      nominatimBaseUrl: data.NOMINATIM_BASE_URL
    },
    dev: data.NODE_ENV !== "production"
  };
}
