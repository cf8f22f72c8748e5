import { describe, expect, it, vi } from "vitest";

import { MapsApiClient, MapsApiError } from "./mapsApi";

const respond = (body: unknown, status = 200) =>
  vi.fn<typeof fetch>().mockImplementation(async () =>
    new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
  );

describe("MapsApiClient", () => {
  it("posts route requests and validates the response", async () => {
    const route = {
      geometry: [
        [27.7172, 85.324],
        [27.7089, 85.3206]
      ],
      distanceM: 950,
      durationS: 855,
      instructions: [{ text: "Head south", distanceM: 950, durationS: 855 }],
      accessibility: { rating: "good", warnings: [], features: ["Step-free route"], obstacles: [] }
    };
    const fetchImpl = respond({ status: "ok", provider: "mock", route });
    const client = new MapsApiClient("http://localhost:5000/", fetchImpl);

    const result = await client.route({ lat: 27.7172, lng: 85.324 }, { lat: 27.7089, lng: 85.3206 }, true);

    expect(result.provider).toBe("mock");
    expect(result.route.accessibility.features).toEqual(["Step-free route"]);
    expect(fetchImpl).toHaveBeenCalledWith("http://localhost:5000/api/navigation/route", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        from: { lat: 27.7172, lng: 85.324 },
        to: { lat: 27.7089, lng: 85.3206 },
        wheelchair: true
      })
    });
  });

  it("encodes search parameters", async () => {
    const fetchImpl = respond({ status: "ok", results: [{ label: "Thamel", lat: 27.7172, lng: 85.3106 }] });
    const client = new MapsApiClient("", fetchImpl);

    await expect(client.geocode("Thamel Chowk", 3)).resolves.toEqual([
      { label: "Thamel", lat: 27.7172, lng: 85.3106 }
    ]);
    expect(fetchImpl).toHaveBeenCalledWith("/api/navigation/geocode?q=Thamel+Chowk&limit=3", undefined);
  });

  it("raises the server's error code", async () => {
    const client = new MapsApiClient("", respond({ status: "error", error: "outside_service_area" }, 422));

    const failure = await client.route({ lat: 40, lng: -74 }, { lat: 27.7, lng: 85.3 }, true).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(MapsApiError);
    expect(failure).toMatchObject({ code: "outside_service_area", status: 422 });
  });

  it("rejects responses that do not match the expected shape", async () => {
    const client = new MapsApiClient("", respond({ status: "ok", label: 42 }));

    await expect(client.reverse({ lat: 27.7, lng: 85.3 })).rejects.toMatchObject({ code: "invalid_response" });
  });
});
