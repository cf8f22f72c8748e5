import type { RoutingService } from "@pathsense/routing";

import { json } from "../../http/responses";

export const DEFAULT_GEOCODE_LIMIT = 5;
export const MAX_GEOCODE_LIMIT = 8;

const parseLimit = (raw: string | null) => {
  const value = raw === null ? Number.NaN : Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    return DEFAULT_GEOCODE_LIMIT;
  }
  return Math.min(MAX_GEOCODE_LIMIT, Math.max(1, value));
};

export function createGeocodeHandler(routing: RoutingService) {
  return async (request: Request): Promise<Response> => {
    const params = new URL(request.url).searchParams;
    const query = params.get("q")?.trim() ?? "";
    if (!query) {
      return json({ status: "error", error: "missing_query" }, { status: 400 });
    }

    const { provider, results } = await routing.search(query, parseLimit(params.get("limit")));
    return json({ status: "ok", provider, results });
  };
}
