// @vitest-environment jsdom
import { act, cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { VoiceManager } from "../shared/voiceManager";
import type { EmergencyActions } from "./emergencyActions";
import { EmergencyPanel, REPEAT_ANNOUNCEMENT } from "./EmergencyPanel";

const setup = () => {
  const actions = {
    call: vi.fn<EmergencyActions["call"]>(),
    share: vi.fn<EmergencyActions["share"]>().mockResolvedValue("shared"),
    locate: vi.fn<EmergencyActions["locate"]>().mockResolvedValue({ lat: 27.7, lng: 85.3 })
  };
  const voice = new VoiceManager(null);
  const speak = vi.spyOn(voice, "speak");
  render(<EmergencyPanel voice={voice} actions={actions} now={() => 5000} />);
  return { actions, speak };
};

const trigger = async () => {
  await act(async () => {
    fireEvent.click(screen.getByRole("button", { name: "🚨 Emergency" }));
  });
};

describe("EmergencyPanel", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    cleanup();
    vi.useRealTimers();
  });

  it("counts down from ten and then calls, shares and alerts", async () => {
    const { actions, speak } = setup();
    await trigger();

    expect(screen.getByTestId("emergency-countdown").textContent).toBe("10");
    expect(actions.locate).toHaveBeenCalledTimes(1);
    expect(speak).toHaveBeenCalledWith("Emergency activated. Help is being called.", "high");

    act(() => {
      vi.advanceTimersByTime(9000);
    });
    expect(screen.getByTestId("emergency-countdown").textContent).toBe("1");
    expect(actions.call).not.toHaveBeenCalled();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(screen.getByText("Emergency active")).toBeTruthy();
    expect(actions.call).toHaveBeenCalledWith("tel:100");
    expect(actions.share).toHaveBeenCalledWith({
      title: "Emergency Location",
      text: "Emergency! I need help. My location: https://maps.google.com/?q=27.7,85.3",
      url: "https://maps.google.com/?q=27.7,85.3"
    });
    expect(screen.getByRole("alertdialog", { name: "Bystander alert" })).toBeTruthy();
  });

  it("dials the configured contact with formatting stripped", async () => {
    const { actions } = setup();
    fireEvent.change(screen.getByLabelText("Emergency contact"), { target: { value: "+977 (98) 123" } });
    await trigger();

    fireEvent.click(screen.getByRole("button", { name: "Call now" }));
    expect(actions.call).toHaveBeenCalledWith("tel:+97798123");
    expect(screen.getByText("Calling +977 (98) 123...")).toBeTruthy();
  });

  it("repeats the announcement while active", async () => {
    const { speak } = setup();
    await trigger();
    act(() => {
      vi.advanceTimersByTime(10000);
    });
    speak.mockClear();

    act(() => {
      vi.advanceTimersByTime(10000);
    });
    expect(speak).toHaveBeenCalledWith(REPEAT_ANNOUNCEMENT, "high");
  });

  it("cancels during the countdown without calling", async () => {
    const { actions, speak } = setup();
    await trigger();
    act(() => {
      vi.advanceTimersByTime(3000);
    });

    fireEvent.click(screen.getByRole("button", { name: "Cancel emergency" }));
    act(() => {
      vi.advanceTimersByTime(10000);
    });

    expect(screen.queryByRole("dialog")).toBeNull();
    expect(actions.call).not.toHaveBeenCalled();
    expect(speak).toHaveBeenCalledWith("Emergency cancelled.", "high");
    expect(screen.getByText("Emergency cancelled")).toBeTruthy();
  });
});
