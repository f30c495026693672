// src/index.ts
export * from "./types/iscc";
export * from "./errors";
export { readConfig, DEFAULT_VERIFY, type Config } from "./config";
export { parseDataset, parseAmount } from "./lib/dataset";
export {
  load,
  lookupById,
  namesAtLevel,
  ancestorsOf,
  descendantsOf,
  resolve,
  resolveMatches,
  resolveWithContext,
  MIN_COLOR_ID,
  MAX_COLOR_ID,
  type LoadOptions,
} from "./lib/resolver";
export {
  parseHue,
  normalizeHue,
  hueToPoint,
  pointToHue,
  formatHue,
  hueFromDegrees,
  hueToDegrees,
  hueSpanContains,
  hueBucket,
} from "./lib/hue";
export { validateDataset } from "./lib/validate";
export { colorCentroids, centroidOf } from "./lib/centroid";
export { parseMunsellNotation, formatMunsellNotation, nameMunsell } from "./lib/notation";
export { loadDatasetFile, type LoadFileOptions } from "./lib/datasetFile";
export { degreeAverage, degreeDiff } from "./utils/degree";
