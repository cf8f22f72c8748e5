import { describe, expect, it } from "vitest";

import { CLEAR_PATH_INSTRUCTION, generateDemoReading } from "./demoReading";

function sequence(...values: number[]) {
  let index = 0;
  return () => values[index++ % values.length] ?? 0;
}

describe("generateDemoReading", () => {
  it("produces the closest obstacle for the lowest draw", () => {
    expect(generateDemoReading(sequence(0, 0))).toEqual({
      distance: 10,
      direction: "left",
      obstacleDetected: true,
      instruction: "Turn left now"
    });
  });

  it("produces a clear path for the highest draw", () => {
    expect(generateDemoReading(sequence(0.999, 0.6))).toEqual({
      distance: 200,
      direction: "right",
      obstacleDetected: false,
      instruction: CLEAR_PATH_INSTRUCTION
    });
  });

  it("switches instruction at the obstacle threshold", () => {
    const below = generateDemoReading(sequence(39.5 / 191, 0));
    const atThreshold = generateDemoReading(sequence(40.5 / 191, 0));

    expect(below.distance).toBe(49);
    expect(below.instruction).toBe("Turn left now");
    expect(atThreshold.distance).toBe(50);
    expect(atThreshold.instruction).toBe(CLEAR_PATH_INSTRUCTION);
  });

  it("never suggests going straight", () => {
    for (let i = 0; i < 50; i += 1) {
      expect(generateDemoReading().direction).not.toBe("straight");
    }
  });
});
