// CHANGE: Provide SHA-256 digest utility for free-text snapshot fields.
// WHY: Names and descriptions are compared by content digest so persisted snapshots stay small.

import { createHash } from "crypto";

const DIGEST_LENGTH = 16;

/**
 * Compute SHA-256 hash of provided buffer.
 *
 * @returns Hexadecimal SHA-256 digest.
 */
export function sha256(buffer: Buffer | string): string {
  return createHash("sha256").update(buffer).digest("hex");
}

/**
 * Short content digest of a text value. Identical input always yields the identical digest.
 *
 * @param text - Free text, already normalised by the caller.
 * @returns First 16 hex characters of the SHA-256 digest.
 */
export function textDigest(text: string): string {
  return sha256(Buffer.from(text, "utf8")).slice(0, DIGEST_LENGTH);
}
