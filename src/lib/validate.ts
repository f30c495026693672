// ============================================================
// src/lib/validate.ts
// Strict dataset checks, beyond what load() needs to build a handle:
// per-level name uniqueness, id contiguity, sorted axes, declared
// boundaries, and a slot grid that catches overlapping or missing cells.
// ============================================================

import { InvalidCoordinateError } from "../errors";
import type { AxisAmount, DatasetDocument, DatasetIssue, DatasetName } from "../types/iscc";
import { hueToPoint, parseHue } from "./hue";

type LevelEntry = { color: number; name: string; abbr: string };

function collectLevels(names: DatasetName[]): LevelEntry[][] {
  const levels: LevelEntry[][] = [];
  const walk = (nodes: DatasetName[], depth: number) => {
    for (const n of nodes) {
      (levels[depth] ??= []).push({ color: n.color, name: n.name, abbr: n.abbr });
      walk(n.children, depth + 1);
    }
  };
  walk(names, 0);
  return levels;
}

function checkLevel(entries: LevelEntry[], level: number, issues: DatasetIssue[]) {
  const byId = new Map<number, LevelEntry>();
  const byName = new Map<string, LevelEntry>();
  const byAbbr = new Map<string, LevelEntry>();
  let maxId = 0;

  for (const e of entries) {
    maxId = Math.max(maxId, e.color);
    const idClash = byId.get(e.color);
    if (idClash) {
      issues.push({
        severity: "error",
        code: "duplicate-id",
        message: `Level ${level}: conflicting color ids for ${e.color}: "${idClash.name}" and "${e.name}"`,
      });
    } else {
      byId.set(e.color, e);
    }

    const nameClash = byName.get(e.name);
    if (nameClash) {
      issues.push({
        severity: "error",
        code: "duplicate-name",
        message: `Level ${level}: duplicate name "${e.name}" used for both id ${nameClash.color} and ${e.color}`,
      });
    } else {
      byName.set(e.name, e);
    }

    const abbrClash = byAbbr.get(e.abbr);
    if (abbrClash) {
      issues.push({
        severity: "error",
        code: "duplicate-abbr",
        message: `Level ${level}: duplicate abbr "${e.abbr}" used for both id ${abbrClash.color} and ${e.color}`,
      });
    } else {
      byAbbr.set(e.abbr, e);
    }
  }

  for (let id = 1; id < maxId; id++) {
    if (!byId.has(id)) {
      issues.push({
        severity: "error",
        code: "missing-id",
        message: `Level ${level}: missing color id ${id} in 1..${maxId}`,
      });
    }
  }
}

function checkSorted(amounts: AxisAmount[], axis: string, issues: DatasetIssue[]) {
  for (let i = 1; i < amounts.length; i++) {
    if (amounts[i].amount < amounts[i - 1].amount) {
      issues.push({
        severity: "error",
        code: "unsorted-amounts",
        message: `${axis} amounts are not in sorted order (${amounts[i - 1].amount} before ${amounts[i].amount})`,
      });
      return;
    }
  }
}

function tryHuePoint(token: string): number | null {
  try {
    return hueToPoint(parseHue(token));
  } catch (err) {
    if (err instanceof InvalidCoordinateError) return null;
    throw err;
  }
}

function amountIndex(amounts: AxisAmount[], x: number) {
  return amounts.findIndex((a) => a.amount === x);
}

export function validateDataset(doc: DatasetDocument): DatasetIssue[] {
  const issues: DatasetIssue[] = [];

  collectLevels(doc.names).forEach((entries, depth) => checkLevel(entries, depth + 1, issues));
  checkSorted(doc.chromas, "chroma", issues);
  checkSorted(doc.values, "value", issues);

  const huePoints = doc.hues.map((token) => {
    const p = tryHuePoint(token);
    if (p === null) {
      issues.push({ severity: "error", code: "unknown-hue", message: `Hue amount "${token}" is not a hue` });
    }
    return p;
  });

  const hueCount = doc.hues.length;
  const chromaSlots = Math.max(0, doc.chromas.length - 1);
  const valueSlots = Math.max(0, doc.values.length - 1);
  const grid = new Int32Array(hueCount * chromaSlots * valueSlots);
  const slot = (h: number, c: number, v: number) => h * chromaSlots * valueSlots + c * valueSlots + v;

  for (const hr of doc.ranges) {
    const where = `hue-range ${hr.begin}–${hr.end}`;
    const hueIndex = (token: string) => {
      const p = tryHuePoint(token);
      const idx = p === null ? -1 : huePoints.indexOf(p);
      if (idx < 0) {
        issues.push({
          severity: "error",
          code: "unknown-hue",
          message: `${where}: "${token}" is not a declared hue amount`,
        });
      }
      return idx;
    };
    const hb = hueIndex(hr.begin);
    const he = hueIndex(hr.end);
    if (hb < 0 || he < 0) continue;
    const hueEnd = he < hb ? he + hueCount : he;

    hr.ranges.forEach((cell, ci) => {
      const cellWhere = `${where} range #${ci + 1}`;
      const bounds = [
        ["chroma-begin", doc.chromas, cell.chromaBegin],
        ["chroma-end", doc.chromas, cell.chromaEnd],
        ["value-begin", doc.values, cell.valueBegin],
        ["value-end", doc.values, cell.valueEnd],
      ] as const;
      const idx = bounds.map(([attr, amounts, x]) => {
        const i = amountIndex(amounts, x);
        if (i < 0) {
          issues.push({
            severity: "error",
            code: "unknown-amount",
            message: `${cellWhere}: ${attr} ${x} is not a declared amount`,
          });
        }
        return i;
      });
      if (idx.some((i) => i < 0)) return;
      const [cb, ce, vb, ve] = idx;

      for (let h = hb; h < hueEnd; h++) {
        const hh = h % hueCount;
        for (let c = cb; c < ce; c++) {
          for (let v = vb; v < ve; v++) {
            const k = slot(hh, c, v);
            if (grid[k] !== 0) {
              issues.push({
                severity: "error",
                code: "overlap",
                message: `Trying to place color ${cell.color} over ${grid[k]} at h=${doc.hues[hh]} c=${doc.chromas[c].amount} v=${doc.values[v].amount}`,
              });
              continue;
            }
            grid[k] = cell.color;
          }
        }
      }
    });
  }

  for (let h = 0; h < hueCount; h++) {
    for (let c = 0; c < chromaSlots; c++) {
      for (let v = 0; v < valueSlots; v++) {
        if (grid[slot(h, c, v)] === 0) {
          issues.push({
            severity: "warning",
            code: "gap",
            message: `No color placed at h=${doc.hues[h]} c=${doc.chromas[c].amount} v=${doc.values[v].amount}`,
          });
        }
      }
    }
  }

  return issues;
}
