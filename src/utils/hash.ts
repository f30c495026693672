// src/utils/hash.ts
import { createHash } from "crypto";

export function hash(str: string) {
  return createHash("sha1").update(str).digest("hex");
}
