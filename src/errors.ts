/**
 * Custom Error Classes
 *
 * Domain-specific error types with proper Error subclassing and context properties.
 * All custom error classes in the application extend the base AppError class.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() so that instanceof checks keep working on
 * subclasses after transpilation.
 *
 * @example
 * ```typescript
 * throw new AppError("Something went wrong", "GENERIC_ERROR");
 * ```
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Validation error for invalid input or state
 *
 * @param field - The field or option that failed validation
 * @param validationErrors - Optional list of specific problems
 */
export class ValidationError extends AppError {
	constructor(
		message: string,
		public readonly field: string,
		public readonly validationErrors?: string[],
		code = "VALIDATION_ERROR",
	) {
		super(message, code);
		this.name = "ValidationError";
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

/**
 * Chunker configuration that would produce no forward progress
 * (e.g. an overlap as large as the window).
 */
export class ChunkingConfigError extends ValidationError {
	constructor(message: string, field: "windowSize" | "overlap") {
		super(message, field, undefined, "CHUNKING_CONFIG");
		this.name = "ChunkingConfigError";
		Object.setPrototypeOf(this, ChunkingConfigError.prototype);
	}
}

/**
 * Source document does not exist at index time
 *
 * @example
 * ```typescript
 * if (!existsSync(path)) {
 *   throw new SourceNotFoundError(path);
 * }
 * ```
 */
export class SourceNotFoundError extends AppError {
	constructor(public readonly path: string) {
		super(`Source not found: ${path}`, "NOT_FOUND");
		this.name = "SourceNotFoundError";
		Object.setPrototypeOf(this, SourceNotFoundError.prototype);
	}
}

/**
 * Source document exists but cannot be read as text
 */
export class MalformedSourceError extends AppError {
	constructor(
		public readonly path: string,
		public readonly reason: string,
	) {
		super(`Cannot decode ${path} as text: ${reason}`, "MALFORMED_INPUT");
		this.name = "MalformedSourceError";
		Object.setPrototypeOf(this, MalformedSourceError.prototype);
	}
}

/**
 * Embedding generation failed
 *
 * Wraps errors raised by the embedding backend with the model name and the
 * original error message.
 */
export class EmbeddingError extends AppError {
	constructor(
		message: string,
		public readonly model: string,
		public readonly originalMessage?: string,
	) {
		super(message, "EMBEDDING_ERROR");
		this.name = "EmbeddingError";
		Object.setPrototypeOf(this, EmbeddingError.prototype);
	}
}

/**
 * Type guard for application errors
 */
export function isAppError(error: unknown): error is AppError {
	return error instanceof AppError;
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
