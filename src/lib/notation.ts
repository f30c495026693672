// src/lib/notation.ts
import { InvalidCoordinateError } from "../errors";
import type { ColorName, MunsellCoordinate, ResolverHandle } from "../types/iscc";
import { formatHue, parseHue } from "./hue";
import { resolve } from "./resolver";

// "5R 4/14", "2.5YR 6.5/ 3", "5r4/14"
const CHROMATIC = /^(\d*\.?\d+)?\s*([A-Z]{1,2})\s*(\d*\.?\d+)\s*\/\s*(\d*\.?\d+)$/;
// "N 5/", "N5", "N 5/0"
const NEUTRAL = /^N\s*(\d*\.?\d+)\s*(?:\/\s*(?:0*\.?0*)?)?$/;

// Neutrals have no hue; they are placed at 5R with zero chroma.
const NEUTRAL_HUE = { magnitude: 5, family: "R" } as const;

export function parseMunsellNotation(notation: string): MunsellCoordinate {
  const s = notation.trim().toUpperCase();

  const n = NEUTRAL.exec(s);
  if (n) {
    return { hue: { ...NEUTRAL_HUE }, value: parseFloat(n[1]), chroma: 0 };
  }

  const m = CHROMATIC.exec(s);
  if (!m) {
    throw new InvalidCoordinateError("hue", `Unrecognized Munsell notation "${notation}"`);
  }
  return {
    hue: parseHue(`${m[1] ?? ""}${m[2]}`),
    value: parseFloat(m[3]),
    chroma: parseFloat(m[4]),
  };
}

const trim = (x: number) => String(Number(x.toFixed(2)));

export function formatMunsellNotation(c: MunsellCoordinate): string {
  return `${formatHue(c.hue)} ${trim(c.value)}/${trim(c.chroma)}`;
}

/** Names for a notation string such as "5R 4/14". */
export function nameMunsell(handle: ResolverHandle, notation: string): ColorName[] {
  const c = parseMunsellNotation(notation);
  return resolve(handle, c.hue, c.value, c.chroma);
}
