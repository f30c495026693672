import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MINI_SYSTEM_PATH, MINI_SYSTEM_XML } from "../__fixtures__";
import { hash } from "../utils/hash";
import { cacheKey, loadDatasetFile } from "./datasetFile";
import { resolve } from "./resolver";

describe("loadDatasetFile", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = mkdtempSync(join(tmpdir(), "iscc-nbs-test-"));
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("loads without touching the cache when caching is off", () => {
    const handle = loadDatasetFile(MINI_SYSTEM_PATH, { cache: false, cacheDir });
    expect(handle.digest).toBe(hash(MINI_SYSTEM_XML));
    expect(existsSync(join(cacheDir, `${cacheKey(MINI_SYSTEM_XML)}.json`))).toBe(false);
  });

  it("writes the parsed document and reuses it", () => {
    const first = loadDatasetFile(MINI_SYSTEM_PATH, { cacheDir });
    const file = join(cacheDir, `${cacheKey(MINI_SYSTEM_XML)}.json`);
    expect(existsSync(file)).toBe(true);
    expect(readFileSync(file, "utf-8")).toContain('"chromaEnd":"Infinity"');

    const second = loadDatasetFile(MINI_SYSTEM_PATH, { cacheDir });
    expect(second.digest).toBe(first.digest);
    expect(second.chromas.map((a) => a.amount)).toEqual([0, 1, 7, 11, Infinity]);
    expect(resolve(second, "5R", 5, 12).map((n) => n.name)).toEqual(["vivid red"]);
  });

  it("ignores a malformed cache entry", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(cacheDir, `${cacheKey(MINI_SYSTEM_XML)}.json`), '{"names": 3}', "utf-8");

    const handle = loadDatasetFile(MINI_SYSTEM_PATH, { cacheDir });
    expect(handle.hueRanges).toHaveLength(4);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("[cache] ignoring malformed entry:");
  });
});
