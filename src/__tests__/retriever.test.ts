/**
 * Tests for semantic/retriever.ts
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../errors.js";
import { fingerprint } from "../semantic/fingerprint.js";
import { DEFAULT_MIN_SCORE, DEFAULT_TOP_K, rankChunks, Retriever } from "../semantic/retriever.js";
import type { EmbeddedChunk } from "../semantic/types.js";
import { VectorStore } from "../semantic/vector-store.js";
import { FixedEmbedder } from "./utils/fakes.js";

/** Unit vector at cosine `score` from [1, 0] */
function atScore(score: number): number[] {
	return [score, Math.sqrt(1 - score * score)];
}

function addChunk(store: VectorStore, text: string, vector: number[] | null, sourcePath = "/notes/a.md"): void {
	store.upsert({ sourcePath, chunkIndex: 0, text, fingerprint: fingerprint(text), vector, metadata: {} });
}

describe("semantic/retriever.ts", () => {
	describe("rankChunks", () => {
		const chunks: EmbeddedChunk[] = [
			{ id: 1, sourcePath: "/a.md", text: "low", vector: atScore(0.2) },
			{ id: 2, sourcePath: "/b.md", text: "high", vector: atScore(0.9) },
			{ id: 3, sourcePath: "/c.md", text: "mid", vector: atScore(0.5) },
		];

		it("filters by minScore and orders by score", () => {
			const hits = rankChunks([1, 0], chunks, { topK: 5, minScore: 0.3 });

			expect(hits.map((h) => h.text)).toEqual(["high", "mid"]);
			expect(hits[0].score).toBeCloseTo(0.9, 10);
			expect(hits[1].score).toBeCloseTo(0.5, 10);
		});

		it("truncates to topK", () => {
			expect(rankChunks([1, 0], chunks, { topK: 1, minScore: -1 }).map((h) => h.text)).toEqual(["high"]);
		});

		it("keeps a chunk scoring exactly minScore", () => {
			const exact: EmbeddedChunk[] = [{ id: 1, sourcePath: "/a.md", text: "exact", vector: [1, 0] }];
			expect(rankChunks([1, 0], exact, { topK: 5, minScore: 1 })).toHaveLength(1);
		});

		it("orders equal scores by id", () => {
			const tied: EmbeddedChunk[] = [
				{ id: 7, sourcePath: "/b.md", text: "later", vector: [1, 0] },
				{ id: 3, sourcePath: "/a.md", text: "earlier", vector: [2, 0] },
			];
			expect(rankChunks([1, 0], tied, { topK: 5, minScore: 0 }).map((h) => h.text)).toEqual(["earlier", "later"]);
		});

		it("skips chunks with a different dimension", () => {
			const mixed: EmbeddedChunk[] = [
				{ id: 1, sourcePath: "/a.md", text: "three dims", vector: [1, 0, 0] },
				{ id: 2, sourcePath: "/b.md", text: "two dims", vector: [1, 0] },
			];
			expect(rankChunks([1, 0], mixed, { topK: 5, minScore: 0 }).map((h) => h.text)).toEqual(["two dims"]);
		});
	});

	describe("Retriever", () => {
		let store: VectorStore;
		let embedder: FixedEmbedder;
		let retriever: Retriever;

		beforeEach(() => {
			store = new VectorStore(":memory:");
			embedder = new FixedEmbedder([1, 0]);
			retriever = new Retriever(store, embedder);
		});

		afterEach(() => {
			store.close();
		});

		it("uses the documented defaults", () => {
			expect(DEFAULT_TOP_K).toBe(5);
			expect(DEFAULT_MIN_SCORE).toBe(0.3);
		});

		it("returns hits above the default threshold, best first", async () => {
			addChunk(store, "weak match", atScore(0.2));
			addChunk(store, "strong match", atScore(0.9), "/notes/strong.md");
			addChunk(store, "fair match", atScore(0.5));

			const outcome = await retriever.search("anything");

			expect(outcome.status).toBe("ok");
			if (outcome.status === "ok") {
				expect(outcome.results.map((r) => r.text)).toEqual(["strong match", "fair match"]);
				expect(outcome.results[0].sourcePath).toBe("/notes/strong.md");
				expect(outcome.results[0].score).toBeCloseTo(0.9, 5);
				expect(outcome.results[1].score).toBeCloseTo(0.5, 5);
			}
			expect(embedder.calls).toEqual(["anything"]);
		});

		it("ignores chunks stored without vectors", async () => {
			addChunk(store, "no vector", null);

			expect(await retriever.search("query", { minScore: -1 })).toEqual({ status: "ok", results: [] });
		});

		it("returns an empty result for a blank query without embedding", async () => {
			addChunk(store, "strong match", atScore(0.9));

			expect(await retriever.search("   ")).toEqual({ status: "ok", results: [] });
			expect(embedder.calls).toEqual([]);
		});

		it("reports unavailable without a provider", async () => {
			const degraded = new Retriever(store, null);

			expect(await degraded.search("query")).toEqual({
				status: "unavailable",
				reason: "No embedding provider is configured",
			});
		});

		it("rejects a non-positive topK", async () => {
			await expect(retriever.search("query", { topK: 0 })).rejects.toThrow(ValidationError);
			await expect(retriever.search("query", { topK: 1.5 })).rejects.toThrow(ValidationError);
		});

		it("rejects a NaN minScore", async () => {
			await expect(retriever.search("query", { minScore: Number.NaN })).rejects.toThrow(ValidationError);
		});
	});
});
