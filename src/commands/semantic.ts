/**
 * Semantic Commands
 *
 * | Command           | Purpose                                    |
 * |-------------------|--------------------------------------------|
 * | semantic index    | Index a file or directory tree             |
 * | semantic search   | Rank indexed chunks against a query        |
 * | semantic stats    | Show index statistics                      |
 */

import { existsSync, statSync } from "node:fs";
import { basename } from "node:path";
import { expandHome, getConfigSource, loadConfig } from "../config.js";
import { getErrorMessage } from "../errors.js";
import { debug, error, header, info, keyValue, list, result, success, warning } from "../output.js";
import { openSemanticMemory, type SemanticMemory } from "../semantic/index.js";
import type { CommandModule } from "./types.js";

// =============================================================================
// Option Types
// =============================================================================

interface IndexOptions {
	pattern?: string;
	force?: boolean;
}

interface SearchOptions {
	limit?: string;
	minScore?: string;
}

const PREVIEW_LENGTH = 200;
const EMBEDDINGS_DISABLED = "Embeddings are disabled; chunks were stored without vectors";

async function withEngine(run: (engine: SemanticMemory) => Promise<void> | void): Promise<void> {
	const config = loadConfig();
	debug("Opening semantic index", {
		configSource: getConfigSource() ?? "defaults",
		stateDir: config.stateDir,
		embeddings: config.embeddings,
	});
	const engine = openSemanticMemory(config);
	try {
		await run(engine);
	} finally {
		engine.close();
	}
}

// =============================================================================
// Handlers
// =============================================================================

export async function handleIndex(path: string | undefined, options: IndexOptions): Promise<void> {
	const config = loadConfig();
	const target = expandHome(path ?? config.indexPath);
	const force = options.force ?? false;

	info(`Indexing ${target}...`);

	try {
		await withEngine(async (engine) => {
			if (existsSync(target) && statSync(target).isFile()) {
				const written = await engine.indexFile(target, { force });
				success(`Indexed ${written} new chunks`, {
					path: target,
					written,
					embeddings: engine.embeddingsAvailable ? "available" : "unavailable",
				});
				if (!engine.embeddingsAvailable) {
					warning(EMBEDDINGS_DISABLED);
				}
				return;
			}

			const report = await engine.indexDirectory(target, {
				pattern: options.pattern ?? config.indexPattern,
				force,
			});

			success(`Indexed ${report.written} new chunks from ${report.filesWithNewChunks} of ${report.filesScanned} files`, {
				...report,
			});
			if (report.embeddings === "unavailable") {
				warning(EMBEDDINGS_DISABLED);
			}
			if (report.failures.length > 0) {
				warning(`${report.failures.length} file(s) could not be indexed`);
				list(report.failures.map((f) => `${f.path}: ${f.message}`));
			}
		});
	} catch (err) {
		error(`Failed to index: ${getErrorMessage(err)}`);
		process.exitCode = 1;
	}
}

export async function handleSearch(query: string, options: SearchOptions): Promise<void> {
	const config = loadConfig();
	const topK = options.limit !== undefined ? Number.parseInt(options.limit, 10) : config.searchLimit;
	const minScore = options.minScore !== undefined ? Number.parseFloat(options.minScore) : config.minScore;

	try {
		await withEngine(async (engine) => {
			const outcome = await engine.search(query, { topK, minScore });

			if (outcome.status === "unavailable") {
				error(`Semantic search unavailable: ${outcome.reason}`);
				process.exitCode = 1;
				return;
			}

			if (outcome.results.length === 0) {
				info("No results found");
				return;
			}

			header(`Search Results (${outcome.results.length})`, query);
			outcome.results.forEach((hit, i) => {
				const preview = hit.text.length > PREVIEW_LENGTH ? `${hit.text.substring(0, PREVIEW_LENGTH)}...` : hit.text;
				result(`[${i + 1}] ${hit.score.toFixed(3)} ${basename(hit.sourcePath)}`, preview, {
					sourcePath: hit.sourcePath,
					score: hit.score,
				});
			});
		});
	} catch (err) {
		error(`Search failed: ${getErrorMessage(err)}`);
		process.exitCode = 1;
	}
}

export async function handleStats(): Promise<void> {
	try {
		await withEngine((engine) => {
			const stats = engine.stats();

			header("Semantic Index Statistics");
			keyValue("Total chunks", stats.totalChunks);
			keyValue("Total files", stats.totalFiles);
			keyValue("Embedded chunks", stats.embeddedChunks);
			keyValue("Embeddings", engine.embeddingsAvailable ? "available" : "unavailable");
		});
	} catch (err) {
		error(`Failed to get stats: ${getErrorMessage(err)}`);
		process.exitCode = 1;
	}
}

// =============================================================================
// Command Module
// =============================================================================

export const semanticCommands: CommandModule = {
	register(program) {
		const semantic = program.command("semantic").description("Semantic search over indexed files");

		semantic
			.command("index [path]")
			.description("Index a file or directory (defaults to the configured indexPath)")
			.option("-p, --pattern <glob>", "File pattern for directories (default from config: *.md)")
			.option("-f, --force", "Rewrite chunks that are already indexed")
			.action((path: string | undefined, options: IndexOptions) => handleIndex(path, options));

		semantic
			.command("search <query>")
			.description("Search indexed chunks by meaning")
			.option("-l, --limit <n>", "Maximum results")
			.option("-m, --min-score <score>", "Minimum cosine similarity")
			.action((query: string, options: SearchOptions) => handleSearch(query, options));

		semantic
			.command("stats")
			.description("Show semantic index statistics")
			.action(() => handleStats());
	},
};
