// src/utils/degree.ts

const toRad = (deg: number) => (deg * Math.PI) / 180;
const toDeg = (rad: number) => (rad * 180) / Math.PI;

/** Circular mean of two angles, in (-180, 180]. */
export function degreeAverage(a: number, b: number): number {
  const cavg = (Math.cos(toRad(a)) + Math.cos(toRad(b))) / 2;
  const savg = (Math.sin(toRad(a)) + Math.sin(toRad(b))) / 2;
  return toDeg(Math.atan2(savg, cavg));
}

/** Shortest distance between two angles, in [0, 180]. */
export function degreeDiff(a: number, b: number): number {
  const d = toRad(a) - toRad(b);
  return Math.abs(toDeg(Math.atan2(Math.sin(d), Math.cos(d))));
}
