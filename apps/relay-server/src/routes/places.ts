import { isPlaceType, listNearbyPlaces } from "@pathsense/routing";

import { json } from "../http/responses";

export async function handlePlaces(request: Request): Promise<Response> {
  const type = new URL(request.url).searchParams.get("type") ?? "all";
  if (type !== "all" && !isPlaceType(type)) {
    return json({ status: "error", error: "invalid_type" }, { status: 400 });
  }
  return json({ status: "ok", places: listNearbyPlaces(type) });
}
