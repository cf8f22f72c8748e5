import type { z } from "zod";

import { DEFAULT_PROVIDER_TIMEOUT_MS, type FetchLike, RoutingError } from "../RoutingProvider";

export type ProviderHttpOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  baseUrl?: string;
};

export const trimBaseUrl = (url: string) => url.replace(/\/$/, "");

export async function requestJson<T extends z.ZodTypeAny>(
  provider: string,
  schema: T,
  url: URL,
  init: RequestInit = {},
  options: ProviderHttpOptions = {}
): Promise<z.infer<T>> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RoutingError(provider, `request failed (${reason})`);
  }

  if (!response.ok) {
    throw new RoutingError(provider, `HTTP ${response.status}`, response.status);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch {
    throw new RoutingError(provider, "response was not JSON", response.status);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new RoutingError(provider, "unexpected response shape", response.status);
  }
  return parsed.data;
}
