import type { RoutingService } from "@pathsense/routing";

import { json } from "../../http/responses";

const parseCoordinate = (raw: string | null) =>
  raw === null || raw.trim() === "" ? Number.NaN : Number(raw);

export function createReverseHandler(routing: RoutingService) {
  return async (request: Request): Promise<Response> => {
    const params = new URL(request.url).searchParams;
    const lat = parseCoordinate(params.get("lat"));
    const lng = parseCoordinate(params.get("lng"));
    if (!Number.isFinite(lat) || !Number.isFinite(lng) || Math.abs(lat) > 90 || Math.abs(lng) > 180) {
      return json({ status: "error", error: "invalid_coordinates" }, { status: 400 });
    }

    const { provider, label } = await routing.reverse({ lat, lng });
    return json({ status: "ok", provider, label });
  };
}
