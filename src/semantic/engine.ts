/**
 * Semantic Memory Engine
 *
 * High-level API over the vector store, indexer and retriever:
 * - Indexing files and directory trees
 * - Cosine-similarity search
 * - Index statistics
 *
 * The embedding provider is optional. Without one the engine runs in degraded
 * mode: chunks are stored without vectors and search reports `unavailable`.
 */

import { type ChronicleConfig, resolveStatePath } from "../config.js";
import { semanticLogger } from "../logger.js";
import { type Chunker, createChunker } from "./chunker.js";
import { type EmbeddingProvider, LocalEmbedder } from "./embedder.js";
import { Indexer } from "./indexer.js";
import { Retriever } from "./retriever.js";
import type {
	ChunkingOptions,
	DirectoryIndexReport,
	IndexDirectoryOptions,
	IndexFileOptions,
	SearchOptions,
	SearchOutcome,
	SemanticStats,
} from "./types.js";
import { VectorStore } from "./vector-store.js";

const logger = semanticLogger.child({ component: "engine" });

export interface SemanticMemoryOptions {
	dbPath: string;
	embedder?: EmbeddingProvider | null;
	chunking?: ChunkingOptions;
}

export class SemanticMemory {
	readonly store: VectorStore;
	private readonly embedder: EmbeddingProvider | null;
	private readonly indexer: Indexer;
	private readonly retriever: Retriever;

	constructor(options: SemanticMemoryOptions) {
		// Validate chunking before opening the database
		const chunker: Chunker = createChunker(options.chunking);

		this.embedder = options.embedder ?? null;
		this.store = new VectorStore(options.dbPath);
		this.indexer = new Indexer(this.store, chunker, this.embedder);
		this.retriever = new Retriever(this.store, this.embedder);

		if (!this.embedder) {
			logger.warn("No embedding provider configured; semantic search is unavailable");
		}
	}

	get embeddingsAvailable(): boolean {
		return this.embedder !== null;
	}

	indexFile(path: string, options?: IndexFileOptions): Promise<number> {
		return this.indexer.indexFile(path, options);
	}

	indexDirectory(root: string, options?: IndexDirectoryOptions): Promise<DirectoryIndexReport> {
		return this.indexer.indexDirectory(root, options);
	}

	search(query: string, options?: SearchOptions): Promise<SearchOutcome> {
		return this.retriever.search(query, options);
	}

	stats(): SemanticStats {
		return this.store.stats();
	}

	close(): void {
		this.store.close();
	}
}

/**
 * Build the engine described by a loaded configuration
 */
export function openSemanticMemory(config: ChronicleConfig): SemanticMemory {
	const embedder = config.embeddings
		? new LocalEmbedder({
				model: config.model,
				cache: config.embeddingCache,
				cacheFile: resolveStatePath(config, "embeddings.cache.json"),
			})
		: null;

	return new SemanticMemory({
		dbPath: resolveStatePath(config, config.semanticDb),
		embedder,
		chunking: { windowSize: config.chunkSize, overlap: config.chunkOverlap },
	});
}
