import { afterEach, describe, expect, it, vi } from "vitest";
import { MINI_SYSTEM_PATH } from "../src/__fixtures__/index.ts";
import { validateDatasetFile } from "./validateDataset.ts";

describe("validateDatasetFile", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("passes a dataset whose only issues are gaps", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(validateDatasetFile(MINI_SYSTEM_PATH)).toBe(0);
    expect(warn).toHaveBeenCalledTimes(9);
    expect(warn).toHaveBeenCalledWith("warning: [gap] No color placed at h=5YR c=1 v=0");
    expect(log).toHaveBeenCalledWith(`✅ ${MINI_SYSTEM_PATH}: 4 hue ranges, 9 warning(s)`);
  });
});
