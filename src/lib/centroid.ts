// src/lib/centroid.ts
// Volume-weighted center of each named region, treating (hue angle, chroma)
// as polar coordinates and value as height. Open-topped axes are capped so
// every block has a finite volume.

import type { CellRange, HueRange, MunsellCoordinate, ResolverHandle } from "../types/iscc";
import { degreeAverage, degreeDiff } from "../utils/degree";
import { pointToHue } from "./hue";
import { lookupById, namesAtLevel } from "./resolver";

const CHROMA_CAP = 16;
const VALUE_CAP = 10;

type Accumulator = { value: number; chroma: number; hueX: number; hueY: number; volume: number };

const round2 = (x: number) => Math.round(x * 100) / 100;

function addBlock(acc: Accumulator, hueRange: HueRange, cell: CellRange) {
  const beginDeg = hueRange.beginPoint * 3.6;
  const endDeg = hueRange.endPoint * 3.6;
  const chromaEnd = Math.min(cell.chromaEnd, CHROMA_CAP);
  const valueEnd = Math.min(cell.valueEnd, VALUE_CAP);
  if (cell.chromaBegin >= chromaEnd || cell.valueBegin >= valueEnd) return;

  const sweep = degreeDiff(beginDeg, endDeg) / 360;
  const area = (chromaEnd * chromaEnd - cell.chromaBegin * cell.chromaBegin) * sweep;
  const volume = area * (valueEnd - cell.valueBegin);

  const centerHue = (degreeAverage(beginDeg, endDeg) * Math.PI) / 180;
  acc.value += ((cell.valueBegin + valueEnd) / 2) * volume;
  acc.chroma += ((cell.chromaBegin + chromaEnd) / 2) * volume;
  acc.hueX += Math.cos(centerHue) * volume;
  acc.hueY += Math.sin(centerHue) * volume;
  acc.volume += volume;
}

function toCoordinate(acc: Accumulator): MunsellCoordinate {
  const degrees = (Math.atan2(acc.hueY / acc.volume, acc.hueX / acc.volume) * 180) / Math.PI;
  return {
    hue: pointToHue(round2(degrees / 3.6)),
    value: round2(acc.value / acc.volume),
    chroma: round2(acc.chroma / acc.volume),
  };
}

/** Centroid of every designation that owns at least one cell. */
export function colorCentroids(handle: ResolverHandle): Map<number, MunsellCoordinate> {
  const accs = new Map<number, Accumulator>();
  for (const color of namesAtLevel(handle)) {
    accs.set(color.id, { value: 0, chroma: 0, hueX: 0, hueY: 0, volume: 0 });
  }
  for (const hr of handle.hueRanges) {
    for (const cell of hr.cells) {
      const acc = accs.get(cell.color);
      if (acc) addBlock(acc, hr, cell);
    }
  }

  const out = new Map<number, MunsellCoordinate>();
  for (const [id, acc] of accs) {
    if (acc.volume > 0) out.set(id, toCoordinate(acc));
  }
  return out;
}

/** Undefined when the color has no region in the dataset. */
export function centroidOf(handle: ResolverHandle, colorId: number): MunsellCoordinate | undefined {
  lookupById(handle, colorId);
  return colorCentroids(handle).get(colorId);
}
