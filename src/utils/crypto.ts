import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function computeStringHash(content: string): string {
  const hash = createHash("sha256");
  hash.update(content);
  return hash.digest("hex");
}

/**
 * Short, stable fingerprint of a file path used inside archive names.
 */
export function computePathHash(filePath: string): string {
  return computeStringHash(filePath).slice(0, 12);
}
