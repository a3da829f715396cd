/**
 * Semantic Index Types
 *
 * Core type definitions for chunked, embedded text and similarity search.
 */

/**
 * A stored chunk of a source document
 */
export interface ChunkRecord {
	id: number;
	sourcePath: string;
	chunkIndex: number;
	text: string;
	fingerprint: string;
	vector: number[] | null;
	createdAt: Date;
	metadata: Record<string, unknown>;
}

/**
 * A chunk ready to be written (id and timestamp are assigned by the store)
 */
export interface NewChunk {
	sourcePath: string;
	chunkIndex: number;
	text: string;
	fingerprint: string;
	vector: number[] | null;
	metadata: Record<string, unknown>;
}

/**
 * Outcome of writing a single chunk
 */
export type UpsertResult = "inserted" | "skipped" | "replaced";

/**
 * A chunk with a vector, as read for scoring
 */
export interface EmbeddedChunk {
	id: number;
	sourcePath: string;
	text: string;
	vector: number[];
}

/**
 * Options for word-window chunking
 */
export interface ChunkingOptions {
	windowSize?: number; // default 500 words
	overlap?: number; // default 50 words
}

export interface IndexFileOptions {
	force?: boolean;
}

export interface IndexDirectoryOptions {
	pattern?: string; // default "**/*.md"
	force?: boolean;
}

/**
 * A file that could not be indexed during a directory walk
 */
export interface IndexFailure {
	path: string;
	code: string;
	message: string;
}

export type EmbeddingAvailability = "available" | "unavailable";

/**
 * Result of indexing a directory tree
 */
export interface DirectoryIndexReport {
	/** Chunks inserted or replaced across all files */
	written: number;
	filesScanned: number;
	filesWithNewChunks: number;
	failures: IndexFailure[];
	embeddings: EmbeddingAvailability;
}

export interface SearchOptions {
	topK?: number; // default 5
	minScore?: number; // default 0.3
}

export interface SearchHit {
	sourcePath: string;
	text: string;
	score: number;
}

/**
 * Search either ran, or could not run because no embedding provider is configured.
 * An empty `results` array always means "searched, found nothing".
 */
export type SearchOutcome = { status: "ok"; results: SearchHit[] } | { status: "unavailable"; reason: string };

export interface SemanticStats {
	totalChunks: number;
	totalFiles: number;
	embeddedChunks: number;
}

/**
 * Database row type for SQLite mapping
 */
export interface ChunkRow {
	id: number;
	source_path: string;
	chunk_index: number;
	content: string;
	fingerprint: string;
	embedding: Buffer | null;
	dimensions: number | null;
	created_at: string;
	metadata: string;
}
