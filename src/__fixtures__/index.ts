// src/__fixtures__/index.ts
import { readFileSync } from "fs";
import { fileURLToPath } from "url";

export const MINI_SYSTEM_PATH = fileURLToPath(new URL("./mini-system.xml", import.meta.url));
export const MINI_SYSTEM_XML = readFileSync(MINI_SYSTEM_PATH, "utf-8");

/** Smallest well-formed system: one hue range, one cell, one name per level. */
export function tinySystem(parts: { names?: string; hues?: string; ranges?: string } = {}) {
  return `<system>
  <names>${parts.names ?? '<name color="1" name="red" abbr="R"/>'}</names>
  <hues>${parts.hues ?? '<amount id="1R"/><amount id="9R"/>'}</hues>
  <chromas><amount>0</amount><amount>INF</amount></chromas>
  <values><amount>0</amount><amount>10</amount></values>
  <ranges>${
    parts.ranges ??
    '<hue-range begin="1R" end="9R"><range color="1" value-begin="0" value-end="10" chroma-begin="0" chroma-end="INF"/></hue-range>'
  }</ranges>
</system>`;
}
