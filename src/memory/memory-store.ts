/**
 * Memory Store
 *
 * SQLite storage for captured memories and question/answer pairs. Search is a
 * plain substring match over memory content; semantic retrieval lives in
 * ../semantic.
 *
 * Tables:
 * - memories: captured memories, immutable once written
 * - asks: question/answer pairs, optionally tied to a memory
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { memoryLogger } from "../logger.js";
import type { AddMemoryOptions, Ask, AskRow, Memory, MemoryRow, MemoryStats, RecallEntry } from "./types.js";

const logger = memoryLogger.child({ component: "memory-store" });

const TagsSchema = z.array(z.string());
const ContextSchema = z.record(z.unknown());

export interface MemoryStoreOptions {
	/** Clock used for timestamps (tests pin it) */
	now?: () => Date;
}

/**
 * Memory id: first 16 hex chars of SHA-256(content + timestamp)
 */
export function memoryId(content: string, timestamp: string): string {
	return createHash("sha256").update(`${content}${timestamp}`).digest("hex").substring(0, 16);
}

/**
 * Escape LIKE wildcards so the query matches literally
 */
export function escapeLike(query: string): string {
	return query.replace(/[\\%_]/g, "\\$&");
}

export class MemoryStore {
	private readonly db: Database.Database;
	private readonly now: () => Date;

	constructor(
		readonly dbPath: string,
		options: MemoryStoreOptions = {},
	) {
		this.now = options.now ?? (() => new Date());

		if (dbPath !== ":memory:") {
			const dir = dirname(dbPath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}
		}

		this.db = new Database(dbPath);
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("busy_timeout = 5000");

		initializeSchema(this.db);
		logger.debug({ path: dbPath }, "Memory database initialized");
	}

	/**
	 * Capture a memory
	 *
	 * Identical content captured within the same millisecond maps to the same
	 * id and is stored once.
	 *
	 * @throws {ValidationError} If content is blank
	 */
	add(options: AddMemoryOptions): Memory {
		if (!options.content.trim()) {
			throw new ValidationError("Memory content cannot be empty", "content");
		}

		const timestamp = this.now().toISOString();
		const memory: Memory = {
			id: memoryId(options.content, timestamp),
			content: options.content,
			timestamp,
			platform: options.platform ?? "unknown",
			project: options.project ?? "default",
			tags: options.tags ?? [],
			context: options.context ?? {},
		};

		this.db
			.prepare(
				`
			INSERT INTO memories (id, content, timestamp, platform, project, tags, context)
			VALUES (?, ?, ?, ?, ?, ?, ?)
			ON CONFLICT(id) DO NOTHING
		`,
			)
			.run(
				memory.id,
				memory.content,
				memory.timestamp,
				memory.platform,
				memory.project,
				JSON.stringify(memory.tags),
				JSON.stringify(memory.context),
			);

		logger.debug({ id: memory.id, platform: memory.platform, project: memory.project }, "Memory added");
		return memory;
	}

	/**
	 * Memories whose content contains `query` (ASCII case-insensitive), newest first
	 */
	search(query: string, limit = 10): Memory[] {
		const rows = this.db
			.prepare(
				`
			SELECT * FROM memories
			WHERE content LIKE ? ESCAPE '\\'
			ORDER BY timestamp DESC, rowid DESC
			LIMIT ?
		`,
			)
			.all(`%${escapeLike(query)}%`, limit) as MemoryRow[];
		return rows.map(rowToMemory);
	}

	/**
	 * Most recent memories
	 */
	context(limit = 10): Memory[] {
		const rows = this.db
			.prepare("SELECT * FROM memories ORDER BY timestamp DESC, rowid DESC LIMIT ?")
			.all(limit) as MemoryRow[];
		return rows.map(rowToMemory);
	}

	/**
	 * Leave a question/answer pair for a later session
	 */
	ask(question: string, answer: string, relatedMemoryId?: string): Ask {
		if (!question.trim()) {
			throw new ValidationError("Question cannot be empty", "question");
		}

		const entry: Ask = {
			question,
			answer,
			memoryId: relatedMemoryId ?? null,
			timestamp: this.now().toISOString(),
		};
		this.db
			.prepare("INSERT INTO asks (question, answer, memory_id, timestamp) VALUES (?, ?, ?, ?)")
			.run(entry.question, entry.answer, entry.memoryId, entry.timestamp);
		return entry;
	}

	/**
	 * Question/answer pairs, newest first, optionally filtered by question text
	 */
	getAsks(query?: string): Ask[] {
		const rows = query
			? (this.db
					.prepare("SELECT * FROM asks WHERE question LIKE ? ESCAPE '\\' ORDER BY timestamp DESC, rowid DESC")
					.all(`%${escapeLike(query)}%`) as AskRow[])
			: (this.db.prepare("SELECT * FROM asks ORDER BY timestamp DESC, rowid DESC").all() as AskRow[]);

		return rows.map((row) => ({
			question: row.question,
			answer: row.answer,
			memoryId: row.memory_id,
			timestamp: row.timestamp,
		}));
	}

	/**
	 * Capture with the source recorded as the platform
	 */
	remember(text: string, source = "unknown", tags?: string[]): Memory {
		return this.add({ content: text, platform: source, tags });
	}

	/**
	 * Substring search returning a simplified view
	 */
	recall(query: string, limit = 5): RecallEntry[] {
		return this.search(query, limit).map((m) => ({
			text: m.content,
			timestamp: m.timestamp,
			source: m.platform,
			tags: m.tags,
		}));
	}

	stats(): MemoryStats {
		const totalMemories = (this.db.prepare("SELECT COUNT(*) AS count FROM memories").get() as { count: number }).count;
		const totalAsks = (this.db.prepare("SELECT COUNT(*) AS count FROM asks").get() as { count: number }).count;

		const platforms = this.db
			.prepare("SELECT platform AS name, COUNT(*) AS count FROM memories GROUP BY platform ORDER BY platform")
			.all() as Array<{ name: string; count: number }>;
		const projects = this.db
			.prepare("SELECT project AS name, COUNT(*) AS count FROM memories GROUP BY project ORDER BY project")
			.all() as Array<{ name: string; count: number }>;

		return {
			totalMemories,
			totalAsks,
			platforms: Object.fromEntries(platforms.map((p) => [p.name, p.count])),
			projects: Object.fromEntries(projects.map((p) => [p.name, p.count])),
			dbPath: this.dbPath,
		};
	}

	close(): void {
		if (this.db.open) {
			this.db.close();
			logger.debug({ path: this.dbPath }, "Memory database connection closed");
		}
	}
}

function initializeSchema(db: Database.Database): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS memories (
			id TEXT PRIMARY KEY,
			content TEXT NOT NULL,
			timestamp TEXT NOT NULL,
			platform TEXT NOT NULL DEFAULT 'unknown',
			project TEXT NOT NULL DEFAULT 'default',
			tags TEXT NOT NULL DEFAULT '[]',
			context TEXT NOT NULL DEFAULT '{}'
		);

		CREATE TABLE IF NOT EXISTS asks (
			question TEXT NOT NULL,
			answer TEXT NOT NULL,
			memory_id TEXT,
			timestamp TEXT NOT NULL
		);

		CREATE INDEX IF NOT EXISTS idx_memories_timestamp ON memories(timestamp);
		CREATE INDEX IF NOT EXISTS idx_memories_project ON memories(project);
		CREATE INDEX IF NOT EXISTS idx_memories_platform ON memories(platform);
	`);
}

function rowToMemory(row: MemoryRow): Memory {
	const tags = TagsSchema.safeParse(JSON.parse(row.tags));
	const context = ContextSchema.safeParse(JSON.parse(row.context));

	return {
		id: row.id,
		content: row.content,
		timestamp: row.timestamp,
		platform: row.platform,
		project: row.project,
		tags: tags.success ? tags.data : [],
		context: context.success ? context.data : {},
	};
}
