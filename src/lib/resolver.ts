// ============================================================
// src/lib/resolver.ts
// ISCC–NBS color name resolver.
//
//   load()         dataset → frozen ResolverHandle (names arena + hue index)
//   resolve()      Munsell (hue, value, chroma) → ordered set of names
//   lookupById()   id → name node
//
// Containment is closed on every axis: a point on a shared hue, value or
// chroma boundary belongs to every region that touches it.
// ============================================================

import { DatasetIntegrityError, InvalidCoordinateError, NotFoundError } from "../errors";
import type {
  CellRange,
  ColorMatch,
  ColorName,
  DatasetDocument,
  DatasetName,
  HueInput,
  HueRange,
  ResolvedColor,
  ResolverHandle,
  VerifyLevel,
} from "../types/iscc";
import { hash } from "../utils/hash";
import { parseDataset } from "./dataset";
import {
  FAMILY_COUNT,
  hueBucket,
  hueInputToPoint,
  hueSpanContains,
  hueToPoint,
  parseHue,
  spanBuckets,
} from "./hue";
import { validateDataset } from "./validate";

export const MIN_COLOR_ID = 1;
export const MAX_COLOR_ID = 267;

export type LoadOptions = {
  verify?: VerifyLevel;
  /** recorded on the handle; defaults to the sha1 of the given dataset */
  digest?: string;
};

// -----------------------------------------------------------------------------
// Load
// -----------------------------------------------------------------------------

type NameDraft = Omit<ColorName, "children"> & { children: number[] };

function buildNames(doc: DatasetDocument) {
  const drafts: NameDraft[] = [];
  const idIndex = new Map<number, Map<number, number>>();
  let deepest = 1;

  const visit = (node: DatasetName, level: number, parent: number | null): number => {
    if (!Number.isInteger(node.color) || node.color < MIN_COLOR_ID || node.color > MAX_COLOR_ID) {
      throw new DatasetIntegrityError(
        `Color id ${node.color} ("${node.name}") is outside ${MIN_COLOR_ID}..${MAX_COLOR_ID}`
      );
    }
    let ids = idIndex.get(level);
    if (!ids) {
      ids = new Map();
      idIndex.set(level, ids);
    }
    const clash = ids.get(node.color);
    if (clash !== undefined) {
      throw new DatasetIntegrityError(
        `Conflicting color ids for ${node.color} at level ${level}: "${drafts[clash].name}" and "${node.name}"`
      );
    }
    deepest = Math.max(deepest, level);

    const index = drafts.length;
    ids.set(node.color, index);
    const draft: NameDraft = { id: node.color, name: node.name, abbr: node.abbr, level, index, parent, children: [] };
    drafts.push(draft);
    for (const child of node.children) draft.children.push(visit(child, level + 1, index));
    return index;
  };

  for (const root of doc.names) visit(root, 1, null);

  const names: ColorName[] = drafts.map((d) => Object.freeze({ ...d, children: Object.freeze(d.children) }));
  return { names, idIndex, designationLevel: deepest };
}

function checkBounds(begin: number, end: number, axis: string, where: string) {
  if (Number.isNaN(begin) || Number.isNaN(end) || begin < 0 || end < 0) {
    throw new DatasetIntegrityError(`${where}: ${axis} bounds must be non-negative`);
  }
  if (begin > end) {
    throw new DatasetIntegrityError(`${where}: ${axis} begins at ${begin} after it ends at ${end}`);
  }
}

function hueBoundary(token: string, where: string) {
  try {
    const spec = parseHue(token);
    return { spec, point: hueToPoint(spec) };
  } catch (err) {
    if (err instanceof InvalidCoordinateError) {
      throw new DatasetIntegrityError(`${where}: "${token}" is not a recognized hue`, { cause: err });
    }
    throw err;
  }
}

function buildHueRanges(
  doc: DatasetDocument,
  hasDesignation: (id: number) => boolean,
  verifyReferences: boolean
): HueRange[] {
  return doc.ranges.map((hr, index) => {
    const where = `hue-range ${hr.begin}–${hr.end}`;
    const begin = hueBoundary(hr.begin, where);
    const end = hueBoundary(hr.end, where);
    if (begin.point === end.point) {
      throw new DatasetIntegrityError(`${where}: begin and end are the same hue`);
    }

    const cells: CellRange[] = hr.ranges.map((c, ci) => {
      const cellWhere = `${where} range #${ci + 1}`;
      checkBounds(c.valueBegin, c.valueEnd, "value", cellWhere);
      checkBounds(c.chromaBegin, c.chromaEnd, "chroma", cellWhere);
      if (verifyReferences && !hasDesignation(c.color)) {
        throw new DatasetIntegrityError(`${cellWhere}: references unknown color id ${c.color}`);
      }
      return Object.freeze({
        index: ci,
        color: c.color,
        valueBegin: c.valueBegin,
        valueEnd: c.valueEnd,
        chromaBegin: c.chromaBegin,
        chromaEnd: c.chromaEnd,
      });
    });

    return Object.freeze({
      index,
      beginToken: hr.begin,
      endToken: hr.end,
      begin: Object.freeze(begin.spec),
      end: Object.freeze(end.spec),
      beginPoint: begin.point,
      endPoint: end.point,
      cells: Object.freeze(cells),
    });
  });
}

function buildBuckets(hueRanges: HueRange[]) {
  const buckets: number[][] = Array.from({ length: FAMILY_COUNT }, () => []);
  for (const hr of hueRanges) {
    for (const b of spanBuckets(hr.beginPoint, hr.endPoint)) buckets[b].push(hr.index);
  }
  for (const bucket of buckets) {
    bucket.sort((a, b) => hueRanges[a].beginPoint - hueRanges[b].beginPoint || a - b);
  }
  return Object.freeze(buckets.map((b) => Object.freeze(b)));
}

/**
 * Loads a dataset (XML text or a parsed document) into a frozen handle.
 * Throws DatasetIntegrityError and returns nothing usable on any problem.
 */
export function load(dataset: string | DatasetDocument, options: LoadOptions = {}): ResolverHandle {
  const verify = options.verify ?? "references";
  const doc = typeof dataset === "string" ? parseDataset(dataset) : dataset;
  const digest = options.digest ?? hash(typeof dataset === "string" ? dataset : JSON.stringify(dataset));

  if (verify === "strict") {
    const issues = validateDataset(doc);
    const errors = issues.filter((i) => i.severity === "error");
    if (errors.length > 0) {
      throw new DatasetIntegrityError(
        `Dataset failed strict validation with ${errors.length} error(s): ${errors[0].message}`,
        { issues }
      );
    }
    const warnings = issues.length - errors.length;
    if (warnings > 0) {
      console.warn(`[iscc-nbs] dataset ${digest.slice(0, 8)}: ${warnings} validation warning(s)`);
    }
  }

  const { names, idIndex, designationLevel } = buildNames(doc);
  const designations = idIndex.get(designationLevel);
  const hueRanges = buildHueRanges(
    doc,
    (id) => designations?.has(id) ?? false,
    verify !== "none"
  );

  return Object.freeze({
    digest,
    names: Object.freeze(names),
    idIndex,
    designationLevel,
    hueRanges: Object.freeze(hueRanges),
    hueBuckets: buildBuckets(hueRanges),
    hues: Object.freeze([...doc.hues]),
    chromas: Object.freeze(doc.chromas.map((a) => Object.freeze({ ...a }))),
    values: Object.freeze(doc.values.map((a) => Object.freeze({ ...a }))),
  });
}

// -----------------------------------------------------------------------------
// Lookup & tree navigation
// -----------------------------------------------------------------------------

export function lookupById(handle: ResolverHandle, colorId: number, level = handle.designationLevel): ColorName {
  const index = handle.idIndex.get(level)?.get(colorId);
  if (index === undefined) throw new NotFoundError(colorId, level);
  return handle.names[index];
}

export function namesAtLevel(handle: ResolverHandle, level = handle.designationLevel): ColorName[] {
  return handle.names.filter((n) => n.level === level);
}

/** Root first. */
export function ancestorsOf(handle: ResolverHandle, color: ColorName): ColorName[] {
  const out: ColorName[] = [];
  for (let p = color.parent; p !== null; p = handle.names[p].parent) out.unshift(handle.names[p]);
  return out;
}

/** Pre-order. */
export function descendantsOf(handle: ResolverHandle, color: ColorName): ColorName[] {
  const out: ColorName[] = [];
  const walk = (n: ColorName) => {
    for (const c of n.children) {
      out.push(handle.names[c]);
      walk(handle.names[c]);
    }
  };
  walk(color);
  return out;
}

// -----------------------------------------------------------------------------
// Resolve
// -----------------------------------------------------------------------------

function checkAxis(field: "value" | "chroma", x: number) {
  if (!Number.isFinite(x) || x < 0) {
    throw new InvalidCoordinateError(field, `Munsell ${field} must be a non-negative number, got ${x}`);
  }
}

function cellContains(cell: CellRange, value: number, chroma: number) {
  return (
    cell.valueBegin <= value &&
    value <= cell.valueEnd &&
    cell.chromaBegin <= chroma &&
    chroma <= cell.chromaEnd
  );
}

/** Every (hue range, cell) containing the point, in dataset order; no dedupe. */
export function resolveMatches(
  handle: ResolverHandle,
  hue: HueInput,
  value: number,
  chroma: number
): ColorMatch[] {
  const point = hueInputToPoint(hue);
  checkAxis("value", value);
  checkAxis("chroma", chroma);

  const hueRanges = handle.hueBuckets[hueBucket(point)]
    .map((i) => handle.hueRanges[i])
    .filter((hr) => hueSpanContains(hr.beginPoint, hr.endPoint, point))
    .sort((a, b) => a.index - b.index);

  const out: ColorMatch[] = [];
  for (const hueRange of hueRanges) {
    for (const cell of hueRange.cells) {
      if (!cellContains(cell, value, chroma)) continue;
      out.push({ color: lookupById(handle, cell.color), hueRange, cell });
    }
  }
  return out;
}

/** Ordered set of names whose region contains or touches the point. Empty = out of gamut. */
export function resolve(handle: ResolverHandle, hue: HueInput, value: number, chroma: number): ColorName[] {
  const seen = new Set<number>();
  const out: ColorName[] = [];
  for (const m of resolveMatches(handle, hue, value, chroma)) {
    if (seen.has(m.color.index)) continue;
    seen.add(m.color.index);
    out.push(m.color);
  }
  return out;
}

export function resolveWithContext(
  handle: ResolverHandle,
  hue: HueInput,
  value: number,
  chroma: number
): ResolvedColor[] {
  return resolve(handle, hue, value, chroma).map((color) => ({
    color,
    ancestors: ancestorsOf(handle, color),
    descendants: descendantsOf(handle, color),
  }));
}
