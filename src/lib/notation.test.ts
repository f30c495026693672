import { describe, expect, it } from "vitest";
import { MINI_SYSTEM_XML } from "../__fixtures__";
import { InvalidCoordinateError } from "../errors";
import { formatMunsellNotation, nameMunsell, parseMunsellNotation } from "./notation";
import { load } from "./resolver";

describe("parseMunsellNotation", () => {
  it("reads chromatic notation with or without spaces", () => {
    expect(parseMunsellNotation("5R 4/14")).toEqual({ hue: { magnitude: 5, family: "R" }, value: 4, chroma: 14 });
    expect(parseMunsellNotation("2.5yr6.5/ 3")).toEqual({
      hue: { magnitude: 2.5, family: "YR" },
      value: 6.5,
      chroma: 3,
    });
    expect(parseMunsellNotation("10RP 2/1")).toEqual({ hue: { magnitude: 10, family: "RP" }, value: 2, chroma: 1 });
  });

  it("places neutrals at 5R with zero chroma", () => {
    const neutral = { hue: { magnitude: 5, family: "R" }, value: 5, chroma: 0 };
    expect(parseMunsellNotation("N 5/")).toEqual(neutral);
    expect(parseMunsellNotation("N5")).toEqual(neutral);
    expect(parseMunsellNotation("N 5/0")).toEqual(neutral);
  });

  it("rejects anything else", () => {
    expect(() => parseMunsellNotation("red")).toThrow(InvalidCoordinateError);
    expect(() => parseMunsellNotation("5R 4")).toThrow(InvalidCoordinateError);
    expect(() => parseMunsellNotation("5XY 4/2")).toThrow(InvalidCoordinateError);
  });
});

describe("formatMunsellNotation", () => {
  it("writes the shortest form", () => {
    expect(formatMunsellNotation({ hue: { magnitude: 2.5, family: "YR" }, value: 6.5, chroma: 3 })).toBe("2.5YR 6.5/3");
    expect(formatMunsellNotation({ hue: { magnitude: 0, family: "Y" }, value: 5, chroma: 13.504 })).toBe("10YR 5/13.5");
  });
});

describe("nameMunsell", () => {
  const handle = load(MINI_SYSTEM_XML);

  it("resolves a notation string", () => {
    expect(nameMunsell(handle, "5R 5/12").map((n) => n.name)).toEqual(["vivid red"]);
    expect(nameMunsell(handle, "N 9/").map((n) => n.name)).toEqual(["white"]);
    expect(nameMunsell(handle, "5G 5/4")).toEqual([]);
  });
});
