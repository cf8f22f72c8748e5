// @vitest-environment jsdom
import type { NearbyPlace, RouteResult } from "@pathsense/routing";
import { act, cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";

import { MapsApiClient, MapsApiError } from "./mapsApi";
import type { RouteMapProps } from "./RouteMap";
import { DEMO_DESTINATION, DEMO_START, WheelchairMaps } from "./WheelchairMaps";

vi.mock("maplibre-gl", () => ({}));

const route: RouteResult = {
  geometry: [
    [27.7172, 85.324],
    [27.7089, 85.3206]
  ],
  distanceM: 1240,
  durationS: 1116,
  instructions: [
    { text: "Head south on Durbar Marg", distanceM: 400, durationS: 360 },
    { text: "Turn left onto Tridevi Sadak", distanceM: 840, durationS: 756 }
  ],
  accessibility: {
    rating: "limited",
    warnings: ["Steep slope ahead"],
    features: ["No stairs on route"],
    obstacles: []
  }
};

const places: NearbyPlace[] = [
  { name: "City Hospital", type: "hospital", accessibility: "good", distanceKm: 0.5, lat: 27.709, lng: 85.321 },
  { name: "Garden Cafe", type: "restaurant", accessibility: "limited", distanceKm: 0.8, lat: 27.715, lng: 85.311 }
];

const setup = () => {
  const api = new MapsApiClient("", vi.fn<typeof fetch>());
  const spies = {
    route: vi.spyOn(api, "route").mockResolvedValue({ provider: "mock", route }),
    geocode: vi.spyOn(api, "geocode").mockResolvedValue([{ label: "Thamel", lat: 27.7172, lng: 85.3106 }]),
    reverse: vi.spyOn(api, "reverse").mockResolvedValue("Asan Tole"),
    places: vi.spyOn(api, "places").mockResolvedValue(places)
  };
  const mapProps: RouteMapProps[] = [];
  const StubMap = (props: RouteMapProps) => {
    mapProps.push(props);
    return <div data-testid="map" />;
  };
  const locate = vi.fn(async () => null);
  render(<WheelchairMaps api={api} locate={locate} MapView={StubMap} />);
  const lastMap = () => mapProps[mapProps.length - 1];
  return { spies, lastMap, locate };
};

const inputValue = (label: string) => {
  const element = screen.getByLabelText(label);
  return element instanceof HTMLInputElement ? element.value : null;
};

describe("WheelchairMaps", () => {
  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it("lists nearby places and filters them by type", async () => {
    setup();
    expect(await screen.findByText("City Hospital")).toBeTruthy();
    expect(screen.getByText("Garden Cafe")).toBeTruthy();

    fireEvent.click(screen.getByRole("button", { name: "Restaurants" }));
    expect(screen.queryByText("City Hospital")).toBeNull();
    expect(screen.getByText("Garden Cafe")).toBeTruthy();
  });

  it("plans the demo route and shows its accessibility summary", async () => {
    const { spies, lastMap } = setup();
    fireEvent.click(screen.getByRole("button", { name: "Demo route" }));
    expect(screen.getByRole("status").textContent).toBe('Demo locations set! Click "Get Directions" to see the route.');
    expect(inputValue("From")).toBe("Kathmandu Durbar Square");

    fireEvent.click(screen.getByRole("button", { name: "Get Directions" }));

    expect((await screen.findByTestId("route-distance")).textContent).toBe("1.2 km");
    expect(spies.route).toHaveBeenCalledWith(DEMO_START, DEMO_DESTINATION, true);
    expect(screen.getByTestId("route-time").textContent).toBe("19 min");
    expect(screen.getByTestId("route-accessibility").textContent).toBe("Partially Accessible");
    expect(screen.getByText("Route via mock")).toBeTruthy();
    expect(screen.getByText("⚠️ Steep slope ahead")).toBeTruthy();
    expect(screen.getByText("400 m • 6 min")).toBeTruthy();
    expect(lastMap()?.route).toBe(route);
  });

  it("asks for endpoints before routing", () => {
    const { spies } = setup();
    fireEvent.click(screen.getByRole("button", { name: "Get Directions" }));

    expect(screen.getByRole("status").textContent).toBe(
      "Please select a starting location or enable location services"
    );
    expect(spies.route).not.toHaveBeenCalled();
  });

  it("fills a field from search results", async () => {
    const { spies } = setup();
    const from = screen.getByLabelText("From");
    fireEvent.change(from, { target: { value: "Thamel" } });
    fireEvent.submit(from);

    fireEvent.click(await screen.findByRole("button", { name: "Thamel" }));
    expect(spies.geocode).toHaveBeenCalledWith("Thamel", 5);
    expect(inputValue("From")).toBe("Thamel");
    expect(screen.queryByRole("list", { name: "From suggestions" })).toBeNull();
  });

  it("selects a destination by clicking the map", async () => {
    const { spies, lastMap } = setup();
    fireEvent.focus(screen.getByLabelText("To"));
    expect(screen.getByText("Click on map to select destination")).toBeTruthy();

    await act(async () => {
      lastMap()?.onMapClick?.({ lat: 40.7, lng: -74 });
    });
    expect(screen.getByRole("status").textContent).toBe("Please select a location within Nepal");

    await act(async () => {
      lastMap()?.onMapClick?.({ lat: 27.7045, lng: 85.3072 });
    });
    expect(spies.reverse).toHaveBeenCalledWith({ lat: 27.7045, lng: 85.3072 });
    expect(inputValue("To")).toBe("Asan Tole");
    expect(lastMap()?.to).toEqual({ lat: 27.7045, lng: 85.3072, label: "Asan Tole" });
  });

  it("routes without wheelchair constraints when the mode is off", async () => {
    const { spies } = setup();
    fireEvent.click(screen.getByRole("button", { name: "♿ Wheelchair mode" }));
    expect(screen.getByRole("status").textContent).toBe("Wheelchair mode disabled");

    fireEvent.click(screen.getByRole("button", { name: "Demo route" }));
    fireEvent.click(screen.getByRole("button", { name: "Get Directions" }));
    await screen.findByTestId("route-distance");

    expect(spies.route).toHaveBeenCalledWith(DEMO_START, DEMO_DESTINATION, false);
  });

  it("explains server-side rejections", async () => {
    const { spies } = setup();
    spies.route.mockRejectedValue(new MapsApiError("outside_service_area", 422));
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    fireEvent.click(screen.getByRole("button", { name: "Demo route" }));
    fireEvent.click(screen.getByRole("button", { name: "Get Directions" }));

    expect(await screen.findByText("Route endpoints must be within Nepal. Please select a valid location.")).toBeTruthy();
    expect(screen.queryByTestId("route-distance")).toBeNull();
  });

  it("falls back to Kathmandu when the position is unavailable", async () => {
    const { locate } = setup();
    await act(async () => {
      fireEvent.click(screen.getByRole("button", { name: "📍 My location" }));
    });

    expect(locate).toHaveBeenCalledTimes(1);
    expect(inputValue("From")).toBe("Kathmandu");
    expect(screen.getByRole("status").textContent).toBe(
      "Unable to get your current location. Using Kathmandu as default."
    );
  });

  it("swaps the endpoints", () => {
    setup();
    fireEvent.click(screen.getByRole("button", { name: "Demo route" }));
    fireEvent.click(screen.getByRole("button", { name: "⇅ Swap" }));

    expect(inputValue("From")).toBe("Thamel, Kathmandu");
    expect(inputValue("To")).toBe("Kathmandu Durbar Square");
  });
});
