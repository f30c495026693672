import { describe, expect, it } from "vitest";
import { degreeAverage, degreeDiff } from "./degree";

describe("degree helpers", () => {
  it("averages angles around the circle", () => {
    expect(degreeAverage(20, 40)).toBeCloseTo(30, 6);
    expect(degreeAverage(350, 20)).toBeCloseTo(5, 6);
  });

  it("measures the shorter arc", () => {
    expect(degreeDiff(20, 40)).toBeCloseTo(20, 6);
    expect(degreeDiff(350, 20)).toBeCloseTo(30, 6);
  });
});
