import { describe, expect, it } from "vitest";
import { MINI_SYSTEM_XML, tinySystem } from "../__fixtures__";
import { NotFoundError } from "../errors";
import { centroidOf, colorCentroids } from "./centroid";
import { load } from "./resolver";

describe("centroids", () => {
  const handle = load(MINI_SYSTEM_XML);

  it("centers a single block on its hue, value and capped chroma", () => {
    expect(centroidOf(handle, 1)).toEqual({
      hue: { magnitude: 5, family: "R" },
      value: 5,
      chroma: 13.5,
    });
  });

  it("centers a block by the middle of its own hue span", () => {
    const tiny = load(
      tinySystem({
        hues: '<amount id="9R"/><amount id="5YR"/>',
        ranges:
          '<hue-range begin="9R" end="5YR"><range color="1" value-begin="2" value-end="6" chroma-begin="2" chroma-end="6"/></hue-range>',
      })
    );
    expect(centroidOf(tiny, 1)).toEqual({
      hue: { magnitude: 2, family: "YR" },
      value: 4,
      chroma: 4,
    });
  });

  it("has an entry for every designation with a region", () => {
    expect(Array.from(colorCentroids(handle).keys()).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it("leaves colors without cells out", () => {
    const tiny = load(
      tinySystem({ names: '<name color="1" name="red" abbr="R"/><name color="2" name="pink" abbr="Pk"/>' })
    );
    expect(centroidOf(tiny, 2)).toBeUndefined();
    expect(() => centroidOf(tiny, 3)).toThrow(NotFoundError);
  });
});
