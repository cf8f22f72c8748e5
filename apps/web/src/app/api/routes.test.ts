import { apiHandlers } from "@pathsense/relay-server";
import { describe, expect, it } from "vitest";

import * as unknownRoute from "./[...path]/route";
import * as healthRoute from "./health/route";
import * as geocodeRoute from "./navigation/geocode/route";
import * as reverseRoute from "./navigation/reverse/route";
import * as directionsRoute from "./navigation/route/route";
import * as placesRoute from "./places/route";
import * as statusRoute from "./status/route";

describe("api routes", () => {
  it("mount the relay handlers on the node runtime", () => {
    expect(statusRoute.GET).toBe(apiHandlers.status);
    expect(healthRoute.GET).toBe(apiHandlers.health);
    expect(directionsRoute.POST).toBe(apiHandlers.route);
    expect(geocodeRoute.GET).toBe(apiHandlers.geocode);
    expect(reverseRoute.GET).toBe(apiHandlers.reverse);
    expect(placesRoute.GET).toBe(apiHandlers.places);
    expect(statusRoute.runtime).toBe("nodejs");
    expect(directionsRoute.runtime).toBe("nodejs");
  });

  it("answers unknown API paths with a JSON 404", async () => {
    const response = await unknownRoute.POST(new Request("http://localhost/api/nope", { method: "POST" }));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ status: "error", error: "not_found" });
  });
});
