// ============================================================
// src/lib/hue.ts
// Munsell hue circle: tokens <-> specs <-> points on a 100-step circle.
// 5R sits at point 0; each family spans 10 points, R → YR → … → RP → R.
// ============================================================

import { InvalidCoordinateError } from "../errors";
import { HUE_FAMILIES, type HueFamily, type HueInput, type HueSpec } from "../types/iscc";

const HUE_TOKEN = /^(\d*\.?\d+)?(RP|R|YR|Y|GY|G|BG|B|PB|P)$/;
const PRECISION = 1e6;

export const FAMILY_COUNT = HUE_FAMILIES.length;

function round(x: number) {
  return Math.round(x * PRECISION) / PRECISION;
}

function mod100(x: number) {
  return ((x % 100) + 100) % 100;
}

export function isHueFamily(s: string): s is HueFamily {
  return HUE_FAMILIES.some((f) => f === s);
}

export function familyIndex(family: HueFamily): number {
  return HUE_FAMILIES.indexOf(family);
}

/** "5YR" → { magnitude: 5, family: "YR" }. A bare family ("R") means its center, 5. */
export function parseHue(token: string): HueSpec {
  const m = HUE_TOKEN.exec(token.trim().toUpperCase());
  if (!m) {
    throw new InvalidCoordinateError("hue", `Unrecognized hue "${token}"`);
  }
  const family = m[2];
  if (!isHueFamily(family)) {
    throw new InvalidCoordinateError("hue", `Unrecognized hue family in "${token}"`);
  }
  const magnitude = m[1] === undefined ? 5 : parseFloat(m[1]);
  return normalizeHue({ magnitude, family });
}

/** Canonical form: magnitude in (0, 10], so 0YR becomes 10R. */
export function normalizeHue(hue: HueSpec): HueSpec {
  if (!isHueFamily(hue.family)) {
    throw new InvalidCoordinateError("hue", `Unrecognized hue family "${hue.family}"`);
  }
  if (!Number.isFinite(hue.magnitude) || hue.magnitude < 0 || hue.magnitude > 10) {
    throw new InvalidCoordinateError(
      "hue",
      `Hue magnitude ${hue.magnitude} is outside [0, 10] for ${hue.family}`
    );
  }
  if (hue.magnitude === 0) {
    const prev = HUE_FAMILIES[(familyIndex(hue.family) + FAMILY_COUNT - 1) % FAMILY_COUNT];
    return { magnitude: 10, family: prev };
  }
  return { magnitude: hue.magnitude, family: hue.family };
}

export function hueToPoint(hue: HueSpec): number {
  const h = normalizeHue(hue);
  return mod100(round(familyIndex(h.family) * 10 + h.magnitude - 5));
}

export function pointToHue(point: number): HueSpec {
  const hp = mod100(round(mod100(point) + 5));
  const idx = Math.floor(hp / 10) % FAMILY_COUNT;
  const magnitude = round(hp - Math.floor(hp / 10) * 10);
  if (magnitude === 0) {
    return { magnitude: 10, family: HUE_FAMILIES[(idx + FAMILY_COUNT - 1) % FAMILY_COUNT] };
  }
  return { magnitude, family: HUE_FAMILIES[idx] };
}

export function hueToDegrees(hue: HueSpec): number {
  return hueToPoint(hue) * 3.6;
}

export function hueFromDegrees(degrees: number): HueSpec {
  if (!Number.isFinite(degrees)) {
    throw new InvalidCoordinateError("hue", `Hue angle ${degrees} is not a finite number`);
  }
  return pointToHue(degrees / 3.6);
}

/**
 * Formats a hue as a token. Without `fractionDigits` trailing zeros are
 * dropped ("5R", "2.5YR"); with it the magnitude is fixed ("5.00R").
 */
export function formatHue(hue: HueSpec, fractionDigits?: number): string {
  const h = normalizeHue(hue);
  const mag =
    fractionDigits === undefined
      ? String(Number(h.magnitude.toFixed(2)))
      : h.magnitude.toFixed(fractionDigits);
  return `${mag}${h.family}`;
}

export function hueInputToPoint(input: HueInput): number {
  if (typeof input === "string") return hueToPoint(parseHue(input));
  if ("degrees" in input) return hueToPoint(hueFromDegrees(input.degrees));
  return hueToPoint(input);
}

/** Closed span [begin, end] on the circle; wraps through 5R when end < begin. */
export function hueSpanContains(beginPoint: number, endPoint: number, point: number): boolean {
  if (beginPoint <= endPoint) return beginPoint <= point && point <= endPoint;
  return point >= beginPoint || point <= endPoint;
}

/** Family bucket of a point; family k owns [10k − 5, 10k + 5). */
export function hueBucket(point: number): number {
  return Math.floor(mod100(point + 5) / 10) % FAMILY_COUNT;
}

/** Every family bucket a closed span touches. */
export function spanBuckets(beginPoint: number, endPoint: number): number[] {
  const end = endPoint >= beginPoint ? endPoint : endPoint + 100;
  const first = Math.floor((beginPoint + 5) / 10);
  const last = Math.floor((end + 5) / 10);
  const out = new Set<number>();
  for (let k = first; k <= last; k++) out.add(k % FAMILY_COUNT);
  return Array.from(out);
}
