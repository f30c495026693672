// src/lib/dataset.ts
// Structural parse of the ISCC–NBS XML (system > names | hues | chromas | values | ranges).
// Semantic checks (hue tokens, references, overlaps) live in resolver.ts and validate.ts.

import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { DatasetIntegrityError } from "../errors";
import type {
  AxisAmount,
  DatasetCell,
  DatasetDocument,
  DatasetHueRange,
  DatasetName,
} from "../types/iscc";

const SECTIONS = ["names", "hues", "chromas", "values", "ranges"] as const;
type SectionName = (typeof SECTIONS)[number];

const INFINITY_TEXT = /^\+?inf(inity)?$/i;

/** Parses an axis number; "INF" / "Infinity" is the open top of an axis. */
export function parseAmount(text: string, where: string): number {
  const t = text.trim();
  if (INFINITY_TEXT.test(t)) return Infinity;
  const n = t === "" ? NaN : Number(t);
  if (!Number.isFinite(n)) {
    throw new DatasetIntegrityError(`${where}: "${text}" is not a number`);
  }
  return n;
}

function requireAttr(node: Cheerio<Element>, attr: string, where: string): string {
  const v = node.attr(attr);
  if (v === undefined) {
    throw new DatasetIntegrityError(`${where}: missing "${attr}" attribute`);
  }
  return v;
}

function parseColorId(text: string, where: string): number {
  const t = text.trim();
  if (!/^\d+$/.test(t)) {
    throw new DatasetIntegrityError(`${where}: color id "${text}" is not an integer`);
  }
  return parseInt(t, 10);
}

function section(system: Cheerio<Element>, name: SectionName): Cheerio<Element> {
  const found = system.children(name);
  if (found.length !== 1) {
    throw new DatasetIntegrityError(
      `<system> must contain exactly one <${name}>, found ${found.length}`
    );
  }
  return found.first();
}

function readNames($: CheerioAPI, parent: Cheerio<Element>, path: string): DatasetName[] {
  return parent
    .children("name")
    .toArray()
    .map((el, i) => {
      const node = $(el);
      const where = `${path}/name[${i + 1}]`;
      return {
        color: parseColorId(requireAttr(node, "color", where), where),
        name: requireAttr(node, "name", where),
        abbr: requireAttr(node, "abbr", where),
        children: readNames($, node, where),
      };
    });
}

function readHues($: CheerioAPI, hues: Cheerio<Element>): string[] {
  return hues
    .children("amount")
    .toArray()
    .map((el, i) => {
      const node = $(el);
      const token = (node.attr("id") ?? node.text()).trim();
      if (!token) {
        throw new DatasetIntegrityError(`hues/amount[${i + 1}]: empty hue amount`);
      }
      return token;
    });
}

function readAmounts($: CheerioAPI, axis: Cheerio<Element>, name: SectionName): AxisAmount[] {
  return axis
    .children("amount")
    .toArray()
    .map((el, i) => {
      const node = $(el);
      const where = `${name}/amount[${i + 1}]`;
      const id = node.attr("id");
      const amount = parseAmount(node.text(), where);
      return id === undefined ? { amount } : { id, amount };
    });
}

function readCell(node: Cheerio<Element>, where: string): DatasetCell {
  return {
    color: parseColorId(requireAttr(node, "color", where), where),
    valueBegin: parseAmount(requireAttr(node, "value-begin", where), `${where} value-begin`),
    valueEnd: parseAmount(requireAttr(node, "value-end", where), `${where} value-end`),
    chromaBegin: parseAmount(requireAttr(node, "chroma-begin", where), `${where} chroma-begin`),
    chromaEnd: parseAmount(requireAttr(node, "chroma-end", where), `${where} chroma-end`),
  };
}

function readHueRanges($: CheerioAPI, ranges: Cheerio<Element>): DatasetHueRange[] {
  return ranges
    .children("hue-range")
    .toArray()
    .map((el, i) => {
      const node = $(el);
      const where = `ranges/hue-range[${i + 1}]`;
      return {
        begin: requireAttr(node, "begin", where),
        end: requireAttr(node, "end", where),
        ranges: node
          .children("range")
          .toArray()
          .map((cellEl, j) => readCell($(cellEl), `${where}/range[${j + 1}]`)),
      };
    });
}

export function parseDataset(xml: string): DatasetDocument {
  const $ = cheerio.load(xml, { xml: true });
  const roots = $.root().children();
  if (roots.length !== 1 || !roots.is("system")) {
    throw new DatasetIntegrityError("Dataset root element must be a single <system>");
  }
  const system = roots.first();

  return {
    names: readNames($, section(system, "names"), "names"),
    hues: readHues($, section(system, "hues")),
    chromas: readAmounts($, section(system, "chromas"), "chromas"),
    values: readAmounts($, section(system, "values"), "values"),
    ranges: readHueRanges($, section(system, "ranges")),
  };
}
