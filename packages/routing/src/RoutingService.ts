import { assessAccessibility } from "./accessibility";
import type { CompleteRoutingProvider, RoutingProvider } from "./RoutingProvider";
import type { LatLng, PlaceResult, RouteOptions, RouteResult } from "./types";

export type ProviderResult<T> = {
  provider: string;
} & T;

type Logger = Pick<Console, "info" | "warn">;

/**
 * Tries each configured provider in order and falls back to an always-available provider.
 */
export class RoutingService {
  private providers: RoutingProvider[];
  private fallback: CompleteRoutingProvider;
  private logger: Logger;

  constructor(providers: RoutingProvider[], fallback: CompleteRoutingProvider, logger: Logger = console) {
    this.providers = providers;
    this.fallback = fallback;
    this.logger = logger;
  }

  providerNames(): string[] {
    return [...this.providers.map((provider) => provider.name), this.fallback.name];
  }

  async route(
    from: LatLng,
    to: LatLng,
    options: RouteOptions
  ): Promise<ProviderResult<{ route: RouteResult }>> {
    const { provider, value } = await this.firstSuccessful("route", (candidate) =>
      candidate.route ? candidate.route(from, to, options) : null
    );
    return {
      provider,
      route: {
        geometry: value.geometry,
        distanceM: value.distanceM,
        durationS: value.durationS,
        instructions: value.instructions,
        accessibility: assessAccessibility(value, options.wheelchair)
      }
    };
  }

  async search(query: string, limit: number): Promise<ProviderResult<{ results: PlaceResult[] }>> {
    const { provider, value } = await this.firstSuccessful("search", (candidate) =>
      candidate.search ? candidate.search(query, limit) : null
    );
    return { provider, results: value.slice(0, limit) };
  }

  async reverse(point: LatLng): Promise<ProviderResult<{ label: string }>> {
    const { provider, value } = await this.firstSuccessful("reverse", (candidate) =>
      candidate.reverse ? candidate.reverse(point) : null
    );
    return { provider, label: value };
  }

  private async firstSuccessful<T>(
    operation: string,
    call: (provider: RoutingProvider) => Promise<T> | null
  ): Promise<{ provider: string; value: T }> {
    for (const provider of this.providers) {
      const pending = call(provider);
      if (!pending) {
        continue;
      }
      try {
        return { provider: provider.name, value: await pending };
      } catch (error) {
        this.logger.warn(`[Routing] ${provider.name} ${operation} failed, trying next provider:`, error);
      }
    }

    const value = await call(this.fallback);
    if (value === null) {
      throw new Error(`Fallback provider cannot ${operation}`);
    }
    this.logger.info(`[Routing] ${operation} served by ${this.fallback.name}`);
    return { provider: this.fallback.name, value };
  }
}
