/**
 * Vector Store
 *
 * SQLite storage for chunk text, fingerprints and embeddings using
 * better-sqlite3. Fingerprints are UNIQUE at the storage layer, so two
 * writers racing on the same new chunk produce one row, never two.
 *
 * Embeddings are stored as little-endian float32 BLOBs and scored in
 * process by the retriever.
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { semanticLogger } from "../logger.js";
import type { ChunkRecord, ChunkRow, EmbeddedChunk, NewChunk, SemanticStats, UpsertResult } from "./types.js";

const logger = semanticLogger.child({ component: "vector-store" });

const FLOAT_BYTES = 4;

export class VectorStore {
	private readonly db: Database.Database;
	private readonly writeChunk: (chunk: NewChunk, force: boolean) => UpsertResult;

	constructor(readonly dbPath: string) {
		if (dbPath !== ":memory:") {
			const dir = dirname(dbPath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}
		}

		this.db = new Database(dbPath);
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("busy_timeout = 5000");
		this.db.pragma("synchronous = NORMAL");

		initializeSchema(this.db);
		this.writeChunk = this.db.transaction((chunk: NewChunk, force: boolean) => this.upsertRow(chunk, force));

		logger.debug({ path: dbPath }, "Semantic database initialized");
	}

	/**
	 * Whether a chunk with this fingerprint is stored
	 */
	has(fingerprint: string): boolean {
		const row = this.db.prepare("SELECT 1 AS found FROM chunks WHERE fingerprint = ?").get(fingerprint);
		return row !== undefined;
	}

	/**
	 * Insert a new fingerprint, or skip or replace an existing one
	 *
	 * With `force`, an existing row keeps its id and has every other column
	 * overwritten; no history of the prior value is kept.
	 */
	upsert(chunk: NewChunk, options: { force?: boolean } = {}): UpsertResult {
		return this.writeChunk(chunk, options.force ?? false);
	}

	/**
	 * Every chunk that has a vector, in insertion order
	 */
	allEmbedded(): EmbeddedChunk[] {
		const rows = this.db
			.prepare("SELECT id, source_path, content, embedding FROM chunks WHERE embedding IS NOT NULL ORDER BY id")
			.all() as Array<Pick<ChunkRow, "id" | "source_path" | "content"> & { embedding: Buffer }>;

		return rows.map((row) => ({
			id: row.id,
			sourcePath: row.source_path,
			text: row.content,
			vector: decodeVector(row.embedding),
		}));
	}

	getByFingerprint(fingerprint: string): ChunkRecord | null {
		const row = this.db.prepare("SELECT * FROM chunks WHERE fingerprint = ?").get(fingerprint) as ChunkRow | undefined;
		return row ? rowToChunk(row) : null;
	}

	/**
	 * Chunks currently recorded under `sourcePath`, in chunk order
	 */
	getBySource(sourcePath: string): ChunkRecord[] {
		const rows = this.db
			.prepare("SELECT * FROM chunks WHERE source_path = ? ORDER BY chunk_index, id")
			.all(sourcePath) as ChunkRow[];
		return rows.map(rowToChunk);
	}

	stats(): SemanticStats {
		const row = this.db
			.prepare(
				`
			SELECT
				COUNT(*) AS total_chunks,
				COUNT(DISTINCT source_path) AS total_files,
				COUNT(embedding) AS embedded_chunks
			FROM chunks
		`,
			)
			.get() as { total_chunks: number; total_files: number; embedded_chunks: number };

		return {
			totalChunks: row.total_chunks,
			totalFiles: row.total_files,
			embeddedChunks: row.embedded_chunks,
		};
	}

	close(): void {
		if (this.db.open) {
			this.db.close();
			logger.debug({ path: this.dbPath }, "Semantic database connection closed");
		}
	}

	private upsertRow(chunk: NewChunk, force: boolean): UpsertResult {
		const values = [
			chunk.sourcePath,
			chunk.chunkIndex,
			chunk.text,
			chunk.fingerprint,
			chunk.vector ? encodeVector(chunk.vector) : null,
			chunk.vector ? chunk.vector.length : null,
			new Date().toISOString(),
			JSON.stringify(chunk.metadata),
		];

		if (!force) {
			const result = this.db
				.prepare(
					`
				INSERT INTO chunks (source_path, chunk_index, content, fingerprint, embedding, dimensions, created_at, metadata)
				VALUES (?, ?, ?, ?, ?, ?, ?, ?)
				ON CONFLICT(fingerprint) DO NOTHING
			`,
				)
				.run(...values);
			return result.changes > 0 ? "inserted" : "skipped";
		}

		const existed = this.has(chunk.fingerprint);
		this.db
			.prepare(
				`
			INSERT INTO chunks (source_path, chunk_index, content, fingerprint, embedding, dimensions, created_at, metadata)
			VALUES (?, ?, ?, ?, ?, ?, ?, ?)
			ON CONFLICT(fingerprint) DO UPDATE SET
				source_path = excluded.source_path,
				chunk_index = excluded.chunk_index,
				content = excluded.content,
				embedding = excluded.embedding,
				dimensions = excluded.dimensions,
				created_at = excluded.created_at,
				metadata = excluded.metadata
		`,
			)
			.run(...values);
		return existed ? "replaced" : "inserted";
	}
}

function initializeSchema(db: Database.Database): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS chunks (
			id INTEGER PRIMARY KEY,
			source_path TEXT NOT NULL,
			chunk_index INTEGER NOT NULL,
			content TEXT NOT NULL,
			fingerprint TEXT NOT NULL UNIQUE,
			embedding BLOB,
			dimensions INTEGER,
			created_at TEXT NOT NULL,
			metadata TEXT NOT NULL DEFAULT '{}'
		);

		CREATE INDEX IF NOT EXISTS idx_chunks_source_path ON chunks(source_path);
	`);
}

export function encodeVector(vector: number[]): Buffer {
	const buffer = Buffer.alloc(vector.length * FLOAT_BYTES);
	for (let i = 0; i < vector.length; i++) {
		buffer.writeFloatLE(vector[i], i * FLOAT_BYTES);
	}
	return buffer;
}

export function decodeVector(blob: Buffer): number[] {
	const vector = new Array<number>(Math.floor(blob.length / FLOAT_BYTES));
	for (let i = 0; i < vector.length; i++) {
		vector[i] = blob.readFloatLE(i * FLOAT_BYTES);
	}
	return vector;
}

function rowToChunk(row: ChunkRow): ChunkRecord {
	return {
		id: row.id,
		sourcePath: row.source_path,
		chunkIndex: row.chunk_index,
		text: row.content,
		fingerprint: row.fingerprint,
		vector: row.embedding ? decodeVector(row.embedding) : null,
		createdAt: new Date(row.created_at),
		metadata: JSON.parse(row.metadata),
	};
}
