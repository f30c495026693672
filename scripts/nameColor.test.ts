import { afterEach, describe, expect, it, vi } from "vitest";
import { MINI_SYSTEM_PATH, MINI_SYSTEM_XML } from "../src/__fixtures__/index.ts";
import { load } from "../src/lib/resolver.ts";
import { describeNotation, nameColors, parseArgs } from "./nameColor.ts";

describe("nameColor", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("splits the dataset flag from notations", () => {
    expect(parseArgs(["--dataset", "x.xml", "5R 4/14", "N 5/"])).toEqual({
      dataset: "x.xml",
      notations: ["5R 4/14", "N 5/"],
    });
  });

  it("describes matches and misses", () => {
    const handle = load(MINI_SYSTEM_XML);
    expect(describeNotation(handle, "5R 5/7")).toBe("5R 5/7: moderate red (m.R), strong red (s.R)");
    expect(describeNotation(handle, "5G 5/4")).toBe("5G 5/4: (no ISCC–NBS name)");
  });

  it("prints one line per notation and fails on bad input", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.stubEnv("ISCC_NBS_CACHE", "0");

    const code = nameColors(["--dataset", MINI_SYSTEM_PATH, "5R 5/12", "purple"]);

    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith("5R 5/12: vivid red (v.R)");
    expect(error).toHaveBeenCalledWith('purple: Unrecognized Munsell notation "purple"');
  });

  it("prints usage without notations", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(nameColors([])).toBe(1);
    expect(error).toHaveBeenCalledWith("usage: nameColor [--dataset PATH] NOTATION...");
  });
});
