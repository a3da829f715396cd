/**
 * Tests for semantic/engine.ts
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getDefaultConfig } from "../config.js";
import { ChunkingConfigError } from "../errors.js";
import { openSemanticMemory, SemanticMemory } from "../semantic/engine.js";
import { createTempDir, KeywordEmbedder, removeTempDir } from "./utils/fakes.js";

vi.mock("@themaximalist/embeddings.js", () => ({
	default: vi.fn(),
}));

describe("semantic/engine.ts", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = createTempDir("engine-test-");
		writeFileSync(join(tempDir, "cats.md"), "the cat sat on the mat");
		writeFileSync(join(tempDir, "dogs.md"), "a dog chased the ball");
	});

	afterEach(() => {
		removeTempDir(tempDir);
	});

	describe("SemanticMemory", () => {
		let memory: SemanticMemory;

		beforeEach(() => {
			memory = new SemanticMemory({
				dbPath: join(tempDir, "state", "semantic.db"),
				embedder: new KeywordEmbedder(["cat", "dog"]),
			});
		});

		afterEach(() => {
			memory.close();
		});

		it("indexes a directory and finds the closest file", async () => {
			const report = await memory.indexDirectory(tempDir);
			expect(report.written).toBe(2);

			const outcome = await memory.search("cat");

			expect(outcome.status).toBe("ok");
			if (outcome.status === "ok") {
				// query [1, 0, 1]: cats [1, 0, 1] scores 1, dogs [0, 1, 1] scores 0.5
				expect(outcome.results.map((r) => r.sourcePath)).toEqual([
					join(tempDir, "cats.md"),
					join(tempDir, "dogs.md"),
				]);
				expect(outcome.results[0].score).toBeCloseTo(1, 5);
				expect(outcome.results[1].score).toBeCloseTo(0.5, 5);
			}
		});

		it("applies minScore and topK", async () => {
			await memory.indexDirectory(tempDir);

			const strict = await memory.search("cat", { minScore: 0.6 });
			const single = await memory.search("cat", { topK: 1, minScore: 0 });

			expect(strict.status === "ok" && strict.results.map((r) => r.text)).toEqual(["the cat sat on the mat"]);
			expect(single.status === "ok" && single.results).toHaveLength(1);
		});

		it("indexes a single file", async () => {
			expect(await memory.indexFile(join(tempDir, "dogs.md"))).toBe(1);
			expect(memory.stats()).toEqual({ totalChunks: 1, totalFiles: 1, embeddedChunks: 1 });
			expect(memory.embeddingsAvailable).toBe(true);
		});
	});

	it("runs in degraded mode without a provider", async () => {
		const memory = new SemanticMemory({ dbPath: ":memory:" });

		const report = await memory.indexDirectory(tempDir);
		const outcome = await memory.search("cat");
		memory.close();

		expect(memory.embeddingsAvailable).toBe(false);
		expect(report.embeddings).toBe("unavailable");
		expect(report.written).toBe(2);
		expect(outcome.status).toBe("unavailable");
	});

	it("rejects invalid chunking before opening the database", () => {
		expect(
			() => new SemanticMemory({ dbPath: join(tempDir, "never", "semantic.db"), chunking: { windowSize: 10, overlap: 10 } }),
		).toThrow(ChunkingConfigError);
	});

	describe("openSemanticMemory", () => {
		it("places the database under the state directory", () => {
			const config = { ...getDefaultConfig(), stateDir: join(tempDir, "state"), embeddings: false };

			const memory = openSemanticMemory(config);

			expect(memory.store.dbPath).toBe(join(tempDir, "state", "semantic.db"));
			expect(memory.embeddingsAvailable).toBe(false);
			memory.close();
		});

		it("configures a local embedder when embeddings are enabled", () => {
			const config = { ...getDefaultConfig(), stateDir: join(tempDir, "state"), embeddings: true };

			const memory = openSemanticMemory(config);

			expect(memory.embeddingsAvailable).toBe(true);
			memory.close();
		});

		it("passes chunking settings through", () => {
			const config = { ...getDefaultConfig(), stateDir: join(tempDir, "state"), chunkSize: 5, chunkOverlap: 5 };

			expect(() => openSemanticMemory(config)).toThrow(ChunkingConfigError);
		});
	});
});
