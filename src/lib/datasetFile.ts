// src/lib/datasetFile.ts
// Load iscc-nbs.xml from disk. The parsed document is cached as JSON under
// the cache dir, keyed by the sha1 of the XML text, so an unchanged file
// skips the XML parse on the next run.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { readConfig } from "../config";
import type { DatasetDocument, ResolverHandle, VerifyLevel } from "../types/iscc";
import { hash } from "../utils/hash";
import { parseDataset } from "./dataset";
import { load } from "./resolver";

// bump when DatasetDocument changes shape
const CACHE_FORMAT = "v1";
const NUMERIC_KEYS = new Set(["amount", "valueBegin", "valueEnd", "chromaBegin", "chromaEnd"]);

export type LoadFileOptions = {
  verify?: VerifyLevel;
  cache?: boolean;
  cacheDir?: string;
};

function isDatasetDocument(x: unknown): x is DatasetDocument {
  if (typeof x !== "object" || x === null) return false;
  return ["names", "hues", "chromas", "values", "ranges"].every((k) =>
    Array.isArray(Reflect.get(x, k))
  );
}

export function cacheKey(xml: string) {
  return hash(`${CACHE_FORMAT}:${xml}`);
}

function readCache(cacheDir: string, key: string): DatasetDocument | null {
  const file = join(cacheDir, `${key}.json`);
  if (!existsSync(file)) return null;
  try {
    const raw = readFileSync(file, "utf-8");
    const obj: unknown = JSON.parse(raw, (k, v: unknown) =>
      NUMERIC_KEYS.has(k) && v === "Infinity" ? Infinity : v
    );
    if (isDatasetDocument(obj)) return obj;
    console.warn("[cache] ignoring malformed entry:", file);
  } catch (e) {
    console.warn("[cache] read failed:", file, e);
  }
  return null;
}

function writeCache(cacheDir: string, key: string, doc: DatasetDocument) {
  try {
    if (!existsSync(cacheDir)) mkdirSync(cacheDir, { recursive: true });
    const file = join(cacheDir, `${key}.json`);
    // JSON has no Infinity; open axis tops are written as "Infinity"
    const json = JSON.stringify(doc, (_k, v: unknown) =>
      typeof v === "number" && v === Infinity ? "Infinity" : v
    );
    writeFileSync(file, json, "utf-8");
  } catch (e) {
    console.warn("[cache] write failed:", e);
  }
}

/** Parses (or reuses the cached parse of) the XML at `path`, then loads it. */
export function loadDatasetFile(path: string, options: LoadFileOptions = {}): ResolverHandle {
  const config = readConfig();
  const verify = options.verify ?? config.verify;
  const useCache = options.cache ?? config.cache;
  const cacheDir = options.cacheDir ?? config.cacheDir;

  const xml = readFileSync(path, "utf-8");
  const digest = hash(xml);
  if (!useCache) return load(xml, { verify, digest });

  const key = cacheKey(xml);
  let doc = readCache(cacheDir, key);
  if (!doc) {
    doc = parseDataset(xml);
    writeCache(cacheDir, key, doc);
  }
  return load(doc, { verify, digest });
}
