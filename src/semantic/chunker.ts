/**
 * Chunker Module
 *
 * Splits documents into overlapping word windows suitable for embedding.
 * Windows are whitespace-joined words, so original spacing is not preserved.
 */

import { ChunkingConfigError } from "../errors.js";
import type { ChunkingOptions } from "./types.js";

export const DEFAULT_WINDOW_SIZE = 500;
export const DEFAULT_OVERLAP = 50;

/**
 * Chunker interface for splitting content into indexable texts
 */
export interface Chunker {
	chunk(text: string): string[];
}

/**
 * Validate and fill in chunking options
 *
 * @throws {ChunkingConfigError} When the window could never advance
 */
export function resolveChunkingOptions(options: ChunkingOptions = {}): Required<ChunkingOptions> {
	const windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
	const overlap = options.overlap ?? DEFAULT_OVERLAP;

	if (!Number.isInteger(windowSize) || windowSize < 1) {
		throw new ChunkingConfigError(`windowSize must be a positive integer, got ${windowSize}`, "windowSize");
	}
	if (!Number.isInteger(overlap) || overlap < 0) {
		throw new ChunkingConfigError(`overlap must be a non-negative integer, got ${overlap}`, "overlap");
	}
	if (overlap >= windowSize) {
		throw new ChunkingConfigError(`overlap (${overlap}) must be less than windowSize (${windowSize})`, "overlap");
	}

	return { windowSize, overlap };
}

/**
 * Split text into windows of `windowSize` words, each starting
 * `windowSize - overlap` words after the previous one.
 *
 * A window starts at every step that is still inside the text, so the last
 * windows may be shorter than `windowSize`. Text without any words comes back
 * verbatim as a single window.
 */
export function chunkWords(text: string, options: ChunkingOptions = {}): string[] {
	const { windowSize, overlap } = resolveChunkingOptions(options);
	return windows(text, windowSize, windowSize - overlap);
}

function windows(text: string, windowSize: number, step: number): string[] {
	const words = text.split(/\s+/).filter((w) => w.length > 0);
	if (words.length === 0) {
		return [text];
	}

	const chunks: string[] = [];
	for (let start = 0; start < words.length; start += step) {
		chunks.push(words.slice(start, start + windowSize).join(" "));
	}
	return chunks;
}

/**
 * Word-window chunker with options validated up front
 */
export class WordWindowChunker implements Chunker {
	readonly windowSize: number;
	readonly overlap: number;

	constructor(options: ChunkingOptions = {}) {
		const resolved = resolveChunkingOptions(options);
		this.windowSize = resolved.windowSize;
		this.overlap = resolved.overlap;
	}

	chunk(text: string): string[] {
		return windows(text, this.windowSize, this.windowSize - this.overlap);
	}
}

/**
 * Create default chunker instance
 */
export function createChunker(options?: ChunkingOptions): Chunker {
	return new WordWindowChunker(options);
}
