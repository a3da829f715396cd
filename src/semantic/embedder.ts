/**
 * Embedder Module
 *
 * The EmbeddingProvider contract plus a local CPU implementation built on
 * embeddings.js (transformers.js / ONNX runtime).
 *
 * - Re-embedding identical text hits the embeddings.js cache
 * - The cache file survives process restarts
 * - First call downloads the model (~90MB) into the HuggingFace cache
 *
 * Providers are constructed by the caller and passed in; the caller owns
 * their lifetime.
 */

import Embeddings from "@themaximalist/embeddings.js";
import { EmbeddingError } from "../errors.js";
import { semanticLogger } from "../logger.js";

const logger = semanticLogger.child({ component: "embedder" });

export const DEFAULT_MODEL = "Xenova/all-MiniLM-L6-v2";
export const DEFAULT_DIMENSIONS = 384;

/**
 * Maps text to a fixed-length vector
 *
 * `embed` must be deterministic for a fixed model and always return
 * `dimensions` numbers.
 */
export interface EmbeddingProvider {
	readonly model: string;
	readonly dimensions: number;
	embed(text: string): Promise<number[]>;
}

export interface EmbedderOptions {
	model?: string; // default: Xenova/all-MiniLM-L6-v2
	dimensions?: number; // default: 384
	cacheFile?: string; // default: embeddings.cache.json
	cache?: boolean; // default: true
}

/**
 * Local embedder using transformers.js (ONNX runtime)
 */
export class LocalEmbedder implements EmbeddingProvider {
	readonly model: string;
	readonly dimensions: number;
	private options: { cache: boolean; cache_file: string; service: "transformers"; model: string };
	private initialized = false;

	constructor(opts: EmbedderOptions = {}) {
		this.model = opts.model ?? DEFAULT_MODEL;
		this.dimensions = opts.dimensions ?? DEFAULT_DIMENSIONS;
		this.options = {
			cache: opts.cache ?? true,
			cache_file: opts.cacheFile ?? "embeddings.cache.json",
			service: "transformers" as const,
			model: this.model,
		};
	}

	/**
	 * Embed a single text string
	 *
	 * @throws {EmbeddingError} If model loading fails, files are missing, or
	 * the ONNX runtime errors
	 */
	async embed(text: string): Promise<number[]> {
		if (!this.initialized) {
			logger.info({ model: this.model }, "Initializing embedder (first call may download model)");
			this.initialized = true;
		}

		let embedding: number[];
		try {
			embedding = await Embeddings(text, this.options);
		} catch (error) {
			throw this.describeFailure(error);
		}

		if (embedding.length !== this.dimensions) {
			throw new EmbeddingError(
				`Model ${this.model} returned ${embedding.length} dimensions, expected ${this.dimensions}`,
				this.model,
			);
		}
		return embedding;
	}

	private describeFailure(error: unknown): EmbeddingError {
		const errorMessage = error instanceof Error ? error.message : String(error);
		const lower = errorMessage.toLowerCase();

		let summary: string;
		let resolution: string;

		if (errorMessage.includes("ENOENT") || lower.includes("no such file")) {
			summary = `Model file not found for ${this.model}`;
			resolution =
				"The ONNX model files may not have been downloaded. " +
				"The first run needs network access to the HuggingFace hub (~/.cache/huggingface).";
		} else if (lower.includes("onnx") || lower.includes("runtime error")) {
			summary = `ONNX runtime error while loading model ${this.model}`;
			resolution = "The cached model may be corrupted. Clear ~/.cache/huggingface and retry.";
		} else if (
			lower.includes("network") ||
			lower.includes("fetch") ||
			errorMessage.includes("ECONNREFUSED") ||
			errorMessage.includes("ETIMEDOUT")
		) {
			summary = `Network error while downloading model ${this.model}`;
			resolution = "Check connectivity, or HTTP_PROXY/HTTPS_PROXY when behind a proxy.";
		} else {
			summary = `Failed to generate embedding using ${this.model}`;
			resolution = "Check that @themaximalist/embeddings.js and its transformers backend are installed.";
		}

		logger.error(
			{
				error: errorMessage,
				model: this.model,
				cacheFile: this.options.cache_file,
				cacheEnabled: this.options.cache,
			},
			summary,
		);

		return new EmbeddingError(`${summary}. ${resolution}`, this.model, errorMessage);
	}
}
