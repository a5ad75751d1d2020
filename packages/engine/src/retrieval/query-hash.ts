import { createHash } from "node:crypto";

/** Short stable digest of query text, safe to put in shared logs. */
export function hashQuery(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 12);
}
