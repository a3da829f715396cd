import { createHash } from "node:crypto";

/** Hex characters kept from the SHA-256 digest (64 bits). */
export const FINGERPRINT_LENGTH = 16;

/**
 * Deterministic content fingerprint used as the chunk deduplication key
 */
export function fingerprint(text: string): string {
	return createHash("sha256").update(text, "utf8").digest("hex").substring(0, FINGERPRINT_LENGTH);
}
