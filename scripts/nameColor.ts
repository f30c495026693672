// scripts/nameColor.ts
// Usage: tsx scripts/nameColor.ts [--dataset iscc-nbs.xml] "5R 4/14" "N 9.5/" ...
import { fileURLToPath } from "url";
import { readConfig } from "../src/config.ts";
import { loadDatasetFile } from "../src/lib/datasetFile.ts";
import { nameMunsell } from "../src/lib/notation.ts";
import type { ResolverHandle } from "../src/types/iscc.ts";

export function describeNotation(handle: ResolverHandle, notation: string): string {
  const names = nameMunsell(handle, notation);
  if (names.length === 0) return `${notation}: (no ISCC–NBS name)`;
  return `${notation}: ${names.map((n) => `${n.name} (${n.abbr})`).join(", ")}`;
}

export function parseArgs(argv: string[]) {
  let dataset: string | undefined;
  const notations: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--dataset") {
      dataset = argv[++i];
    } else {
      notations.push(argv[i]);
    }
  }
  return { dataset, notations };
}

export function nameColors(argv: string[]): number {
  const { dataset, notations } = parseArgs(argv);
  if (notations.length === 0) {
    console.error("usage: nameColor [--dataset PATH] NOTATION...");
    return 1;
  }

  const handle = loadDatasetFile(dataset ?? readConfig().datasetPath);
  let failed = 0;
  for (const notation of notations) {
    try {
      console.log(describeNotation(handle, notation));
    } catch (e) {
      failed++;
      console.error(`${notation}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  return failed > 0 ? 1 : 0;
}

// Auto-run if invoked directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    process.exitCode = nameColors(process.argv.slice(2));
  } catch (e) {
    console.error("❌", e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
}
