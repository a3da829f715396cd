import { ValidationError } from "../errors.js";

/**
 * Cosine similarity of two vectors of equal length
 *
 * A zero-magnitude vector on either side scores 0. The result is clamped to
 * [-1, 1] to absorb floating point drift.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
	if (a.length !== b.length) {
		throw new ValidationError(`Vector length mismatch: ${a.length} vs ${b.length}`, "vector");
	}

	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}

	if (normA === 0 || normB === 0) {
		return 0;
	}

	const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
	return Math.max(-1, Math.min(1, score));
}
