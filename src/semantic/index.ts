/**
 * Semantic Module
 *
 * Local semantic index over text files:
 * - word-window chunking with overlap
 * - SHA-256 fingerprints for deduplication
 * - embeddings.js for CPU-based embeddings (Xenova/all-MiniLM-L6-v2)
 * - better-sqlite3 storage and exhaustive cosine-similarity ranking
 */

export { type Chunker, chunkWords, createChunker, resolveChunkingOptions, WordWindowChunker } from "./chunker.js";
export { type EmbedderOptions, type EmbeddingProvider, LocalEmbedder } from "./embedder.js";
export { openSemanticMemory, SemanticMemory, type SemanticMemoryOptions } from "./engine.js";
export { fingerprint } from "./fingerprint.js";
export { Indexer, readSource } from "./indexer.js";
export { rankChunks, Retriever } from "./retriever.js";
export { cosineSimilarity } from "./similarity.js";
export type {
	ChunkingOptions,
	ChunkRecord,
	DirectoryIndexReport,
	EmbeddedChunk,
	IndexDirectoryOptions,
	IndexFailure,
	IndexFileOptions,
	NewChunk,
	SearchHit,
	SearchOptions,
	SearchOutcome,
	SemanticStats,
	UpsertResult,
} from "./types.js";
export { VectorStore } from "./vector-store.js";
