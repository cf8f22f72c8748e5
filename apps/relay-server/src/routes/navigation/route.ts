import { type RoutingService, isValidLatLng, isWithinServiceArea } from "@pathsense/routing";
import { z } from "zod";

import { json, readJson } from "../../http/responses";

const pointSchema = z.object({
  lat: z.number().finite(),
  lng: z.number().finite()
});

const routeRequestSchema = z.object({
  from: pointSchema,
  to: pointSchema,
  wheelchair: z.boolean().default(true)
});

export function createRouteHandler(routing: RoutingService) {
  return async (request: Request): Promise<Response> => {
    const parsed = routeRequestSchema.safeParse(await readJson(request));
    if (!parsed.success || !isValidLatLng(parsed.data.from) || !isValidLatLng(parsed.data.to)) {
      return json({ status: "error", error: "invalid_payload" }, { status: 400 });
    }

    const { from, to, wheelchair } = parsed.data;
    if (!isWithinServiceArea(from) || !isWithinServiceArea(to)) {
      return json({ status: "error", error: "outside_service_area" }, { status: 422 });
    }

    const { provider, route } = await routing.route(from, to, { wheelchair });
    return json({ status: "ok", provider, route });
  };
}
