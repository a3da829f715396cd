/**
 * Indexer
 *
 * Chunks, fingerprints, embeds and stores files. A chunk whose fingerprint is
 * already stored is never embedded again unless the caller forces it.
 *
 * Missing sources raise SourceNotFoundError instead of returning 0, so a zero
 * count always means "nothing new to write".
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { glob } from "glob";
import { getErrorMessage, isAppError, MalformedSourceError, SourceNotFoundError } from "../errors.js";
import { semanticLogger } from "../logger.js";
import type { Chunker } from "./chunker.js";
import type { EmbeddingProvider } from "./embedder.js";
import { fingerprint } from "./fingerprint.js";
import type { DirectoryIndexReport, IndexDirectoryOptions, IndexFailure, IndexFileOptions } from "./types.js";
import type { VectorStore } from "./vector-store.js";

const logger = semanticLogger.child({ component: "indexer" });

export const DEFAULT_PATTERN = "*.md";

/**
 * Read a whole file as strict UTF-8
 *
 * @throws {SourceNotFoundError} If the path does not exist
 * @throws {MalformedSourceError} If the path is not a regular file or is not text
 */
export function readSource(path: string): string {
	if (!existsSync(path)) {
		throw new SourceNotFoundError(path);
	}
	if (!statSync(path).isFile()) {
		throw new MalformedSourceError(path, "not a regular file");
	}

	let text: string;
	try {
		text = new TextDecoder("utf-8", { fatal: true }).decode(readFileSync(path));
	} catch (error) {
		throw new MalformedSourceError(path, getErrorMessage(error));
	}

	if (text.includes("\u0000")) {
		throw new MalformedSourceError(path, "contains NUL bytes");
	}
	return text;
}

/**
 * A bare pattern like "*.md" matches at any depth
 */
export function toRecursivePattern(pattern: string): string {
	return pattern.includes("/") ? pattern : `**/${pattern}`;
}

export class Indexer {
	constructor(
		private store: VectorStore,
		private chunker: Chunker,
		private embedder: EmbeddingProvider | null,
	) {}

	/**
	 * Index one file
	 *
	 * @returns Chunks inserted or replaced (not the number chunked)
	 * @throws {SourceNotFoundError} If the file does not exist
	 * @throws {MalformedSourceError} If the file cannot be decoded as text
	 */
	async indexFile(filePath: string, options: IndexFileOptions = {}): Promise<number> {
		const force = options.force ?? false;
		const sourcePath = resolve(filePath);
		const text = readSource(sourcePath);

		// Whitespace-only text still indexes as one verbatim chunk
		if (text.length === 0) {
			logger.debug({ sourcePath }, "Empty file, nothing to index");
			return 0;
		}

		const chunks = this.chunker.chunk(text);
		let written = 0;

		for (let i = 0; i < chunks.length; i++) {
			const chunkText = chunks[i];
			const hash = fingerprint(chunkText);

			if (!force && this.store.has(hash)) {
				continue;
			}

			const vector = this.embedder ? await this.embedder.embed(chunkText) : null;
			const outcome = this.store.upsert(
				{
					sourcePath,
					chunkIndex: i,
					text: chunkText,
					fingerprint: hash,
					vector,
					metadata: { source: sourcePath, chunk: i },
				},
				{ force },
			);

			if (outcome !== "skipped") {
				written++;
			}
		}

		logger.debug({ sourcePath, chunks: chunks.length, written, embedded: this.embedder !== null }, "File indexed");
		return written;
	}

	/**
	 * Index every file under `root` matching the glob pattern
	 *
	 * Files are indexed one at a time in path order. A file that fails is
	 * recorded in the report and the walk continues.
	 *
	 * @throws {SourceNotFoundError} If `root` is not an existing directory
	 */
	async indexDirectory(root: string, options: IndexDirectoryOptions = {}): Promise<DirectoryIndexReport> {
		const rootPath = resolve(root);
		if (!existsSync(rootPath) || !statSync(rootPath).isDirectory()) {
			throw new SourceNotFoundError(rootPath);
		}

		const pattern = toRecursivePattern(options.pattern ?? DEFAULT_PATTERN);
		const files = await glob(pattern, {
			cwd: rootPath,
			nodir: true,
			absolute: true,
		});
		files.sort();

		const failures: IndexFailure[] = [];
		let written = 0;
		let filesWithNewChunks = 0;

		for (const file of files) {
			try {
				const count = await this.indexFile(file, { force: options.force });
				if (count > 0) {
					filesWithNewChunks++;
					logger.info({ file, chunks: count }, "Indexed file");
				}
				written += count;
			} catch (error) {
				const failure: IndexFailure = {
					path: file,
					code: isAppError(error) ? error.code : "UNKNOWN",
					message: getErrorMessage(error),
				};
				failures.push(failure);
				logger.warn(failure, "Failed to index file, continuing");
			}
		}

		logger.info(
			{ root: rootPath, pattern, files: files.length, written, failures: failures.length },
			"Directory indexed",
		);

		return {
			written,
			filesScanned: files.length,
			filesWithNewChunks,
			failures,
			embeddings: this.embedder ? "available" : "unavailable",
		};
	}
}
