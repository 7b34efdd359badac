import { createHash } from "node:crypto";

export const ID_LENGTH = 10;

/**
 * Short URL-safe token derived from an item's mechanical content. Items that
 * differ only in flavor share a token.
 */
export function identityHash(parts: string[]): string {
  return createHash("sha1").update(parts.join("")).digest("base64url").slice(0, ID_LENGTH);
}
