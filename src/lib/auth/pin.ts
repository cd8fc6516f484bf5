/**
 * PIN hashing and verification.
 *
 * Both sides are reduced to SHA-256 digests before comparison so the compare
 * runs over equal-length buffers regardless of input length.
 */

import * as crypto from "node:crypto";

const DIGEST = "sha256";

function hashPin(pin: string): Buffer {
  return crypto.createHash(DIGEST).update(pin, "utf8").digest();
}

/**
 * Check a submitted PIN against the configured one.
 * The configured digest is recomputed on every call.
 */
export function verifyPin(submitted: string, configured: string): boolean {
  return crypto.timingSafeEqual(hashPin(submitted.trim()), hashPin(configured.trim()));
}
