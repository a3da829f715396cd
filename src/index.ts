/**
 * Chronicle - Centralized Export Module
 *
 * Single entry point for library use:
 * - Memory store for captured memories and question/answer pairs
 * - Semantic index and search over local text files
 * - Configuration, errors and logging
 */

// Configuration
export {
	type ChronicleConfig,
	type ChronicleRc,
	ChronicleRcSchema,
	clearConfigCache,
	expandHome,
	getConfigSource,
	getDefaultConfig,
	loadConfig,
	resolveStatePath,
} from "./config.js";

// Errors
export {
	AppError,
	ChunkingConfigError,
	EmbeddingError,
	getErrorMessage,
	isAppError,
	MalformedSourceError,
	SourceNotFoundError,
	ValidationError,
} from "./errors.js";

// Logging
export { logger, memoryLogger, semanticLogger } from "./logger.js";

// Memory store
export * from "./memory/index.js";

// Semantic memory
export * from "./semantic/index.js";
