// scripts/validateDataset.ts
// Usage: tsx scripts/validateDataset.ts [iscc-nbs.xml]
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { readConfig } from "../src/config.ts";
import { parseDataset } from "../src/lib/dataset.ts";
import { validateDataset } from "../src/lib/validate.ts";

export function validateDatasetFile(path: string): number {
  const doc = parseDataset(readFileSync(path, "utf-8"));
  const issues = validateDataset(doc);

  for (const issue of issues) {
    const line = `${issue.severity}: [${issue.code}] ${issue.message}`;
    if (issue.severity === "error") console.error(line);
    else console.warn(line);
  }

  const errors = issues.filter((i) => i.severity === "error").length;
  if (errors > 0) {
    console.error(`❌ ${path}: ${errors} error(s), ${issues.length - errors} warning(s)`);
    return 1;
  }
  console.log(`✅ ${path}: ${doc.ranges.length} hue ranges, ${issues.length} warning(s)`);
  return 0;
}

// Auto-run if invoked directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    process.exitCode = validateDatasetFile(process.argv[2] ?? readConfig().datasetPath);
  } catch (e) {
    console.error("❌", e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
}
