// src/config.ts
import { join } from "path";
import type { VerifyLevel } from "./types/iscc";

export type Config = {
  datasetPath: string;
  verify: VerifyLevel;
  cache: boolean;
  cacheDir: string;
};

const VERIFY_LEVELS: readonly VerifyLevel[] = ["none", "references", "strict"];
export const DEFAULT_VERIFY: VerifyLevel = "references";

function isVerifyLevel(s: string): s is VerifyLevel {
  return VERIFY_LEVELS.some((v) => v === s);
}

/**
 * ISCC_NBS_DATASET     path to iscc-nbs.xml
 * ISCC_NBS_VERIFY      none | references | strict
 * ISCC_NBS_CACHE       "0" turns the parse cache off
 * ISCC_NBS_CACHE_DIR   defaults to $TMPDIR/iscc-nbs-cache
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const tmp = env.TMPDIR || "/tmp";

  let verify = DEFAULT_VERIFY;
  const rawVerify = env.ISCC_NBS_VERIFY?.trim().toLowerCase();
  if (rawVerify) {
    if (isVerifyLevel(rawVerify)) {
      verify = rawVerify;
    } else {
      console.warn(`[iscc-nbs] ignoring ISCC_NBS_VERIFY="${env.ISCC_NBS_VERIFY}", using "${DEFAULT_VERIFY}"`);
    }
  }

  return {
    datasetPath: env.ISCC_NBS_DATASET || "iscc-nbs.xml",
    verify,
    cache: env.ISCC_NBS_CACHE !== "0",
    cacheDir: env.ISCC_NBS_CACHE_DIR || join(tmp, "iscc-nbs-cache"),
  };
}
