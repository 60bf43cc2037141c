import { createHash } from "node:crypto";

/**
 * SHA-256 hex digest of the full content
 */
export function computeHash(content: Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
