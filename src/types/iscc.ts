// ==============================================
// FILE: src/types/iscc.ts
// Shared types for the ISCC–NBS dataset, the Munsell axes and the resolver handle
// ==============================================

export const HUE_FAMILIES = ["R", "YR", "Y", "GY", "G", "BG", "B", "PB", "P", "RP"] as const;
export type HueFamily = (typeof HUE_FAMILIES)[number];

export interface HueSpec {
  magnitude: number; // (0, 10] once normalized
  family: HueFamily;
}

/** Hue as given by a caller: a token like "5YR", a HueSpec or an angle (0° = 5R). */
export type HueInput = string | HueSpec | { degrees: number };

export interface MunsellCoordinate {
  hue: HueSpec;
  value: number;
  chroma: number;
}

// ----------------------------------------------
// Dataset document (what the XML says, before indexing)
// ----------------------------------------------

export interface DatasetName {
  color: number;
  name: string;
  abbr: string;
  children: DatasetName[];
}

export interface AxisAmount {
  id?: string;
  amount: number; // Infinity for the open top of an axis
}

export interface DatasetCell {
  color: number;
  valueBegin: number;
  valueEnd: number;
  chromaBegin: number;
  chromaEnd: number;
}

export interface DatasetHueRange {
  begin: string; // hue token, e.g. "9RP"
  end: string;
  ranges: DatasetCell[];
}

export interface DatasetDocument {
  names: DatasetName[];
  hues: string[];
  chromas: AxisAmount[];
  values: AxisAmount[];
  ranges: DatasetHueRange[];
}

// ----------------------------------------------
// Resolver handle (frozen after load)
// ----------------------------------------------

export interface ColorName {
  readonly id: number;
  readonly name: string;
  readonly abbr: string;
  readonly level: number; // 1 = top-level
  readonly index: number; // position in the name arena
  readonly parent: number | null;
  readonly children: readonly number[];
}

export interface CellRange {
  readonly index: number;
  readonly color: number;
  readonly valueBegin: number;
  readonly valueEnd: number;
  readonly chromaBegin: number;
  readonly chromaEnd: number;
}

export interface HueRange {
  readonly index: number;
  readonly beginToken: string;
  readonly endToken: string;
  readonly begin: HueSpec;
  readonly end: HueSpec;
  readonly beginPoint: number;
  readonly endPoint: number;
  readonly cells: readonly CellRange[];
}

export type VerifyLevel = "none" | "references" | "strict";

export interface ResolverHandle {
  readonly digest: string;
  readonly names: readonly ColorName[];
  readonly idIndex: ReadonlyMap<number, ReadonlyMap<number, number>>; // level -> id -> arena index
  readonly designationLevel: number;
  readonly hueRanges: readonly HueRange[];
  readonly hueBuckets: readonly (readonly number[])[]; // family index -> hue range indices
  readonly hues: readonly string[];
  readonly chromas: readonly AxisAmount[];
  readonly values: readonly AxisAmount[];
}

export interface ColorMatch {
  color: ColorName;
  hueRange: HueRange;
  cell: CellRange;
}

export interface ResolvedColor {
  color: ColorName;
  ancestors: ColorName[]; // root first
  descendants: ColorName[]; // pre-order
}

export type IssueSeverity = "error" | "warning";

export type IssueCode =
  | "duplicate-id"
  | "duplicate-name"
  | "duplicate-abbr"
  | "missing-id"
  | "unsorted-amounts"
  | "unknown-hue"
  | "unknown-amount"
  | "overlap"
  | "gap";

export interface DatasetIssue {
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
}
