/**
 * Retriever
 *
 * Exhaustive cosine-similarity search over every embedded chunk. Suited to
 * tens of thousands of chunks; an approximate index could replace the scan
 * behind the same `search` contract.
 */

import { ValidationError } from "../errors.js";
import { semanticLogger } from "../logger.js";
import type { EmbeddingProvider } from "./embedder.js";
import { cosineSimilarity } from "./similarity.js";
import type { EmbeddedChunk, SearchHit, SearchOptions, SearchOutcome } from "./types.js";
import type { VectorStore } from "./vector-store.js";

const logger = semanticLogger.child({ component: "retriever" });

export const DEFAULT_TOP_K = 5;
export const DEFAULT_MIN_SCORE = 0.3;

/**
 * Score, filter and order chunks against a query vector
 *
 * Highest score first; equal scores keep insertion order. Chunks embedded
 * with a different dimension than the query are skipped.
 */
export function rankChunks(
	queryVector: number[],
	chunks: EmbeddedChunk[],
	options: Required<SearchOptions>,
): SearchHit[] {
	const scored: Array<{ id: number; hit: SearchHit }> = [];
	let mismatched = 0;

	for (const chunk of chunks) {
		if (chunk.vector.length !== queryVector.length) {
			mismatched++;
			continue;
		}

		const score = cosineSimilarity(queryVector, chunk.vector);
		if (score >= options.minScore) {
			scored.push({ id: chunk.id, hit: { sourcePath: chunk.sourcePath, text: chunk.text, score } });
		}
	}

	if (mismatched > 0) {
		logger.warn(
			{ mismatched, dimensions: queryVector.length },
			"Skipped chunks embedded with a different dimension; re-index with --force",
		);
	}

	scored.sort((a, b) => b.hit.score - a.hit.score || a.id - b.id);
	return scored.slice(0, options.topK).map((s) => s.hit);
}

export class Retriever {
	constructor(
		private store: VectorStore,
		private embedder: EmbeddingProvider | null,
	) {}

	/**
	 * Search the index
	 *
	 * Without an embedding provider the store is not read and the outcome is
	 * `unavailable`.
	 */
	async search(query: string, options: SearchOptions = {}): Promise<SearchOutcome> {
		const topK = options.topK ?? DEFAULT_TOP_K;
		const minScore = options.minScore ?? DEFAULT_MIN_SCORE;

		if (!Number.isInteger(topK) || topK < 1) {
			throw new ValidationError(`topK must be a positive integer, got ${topK}`, "topK");
		}
		if (Number.isNaN(minScore)) {
			throw new ValidationError("minScore must be a number", "minScore");
		}

		if (!this.embedder) {
			return { status: "unavailable", reason: "No embedding provider is configured" };
		}

		if (!query.trim()) {
			return { status: "ok", results: [] };
		}

		const queryVector = await this.embedder.embed(query);
		const chunks = this.store.allEmbedded();
		const results = rankChunks(queryVector, chunks, { topK, minScore });

		logger.debug({ scanned: chunks.length, returned: results.length, topK, minScore }, "Search complete");
		return { status: "ok", results };
	}
}
