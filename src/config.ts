/**
 * Configuration File Support
 *
 * Loads configuration from .chroniclerc (JSON format) to provide defaults for
 * the memory store, the semantic index and the CLI.
 *
 * Configuration is loaded from (in order of precedence, highest first):
 * 1. CLI flags (applied by the commands)
 * 2. Environment (CHRONICLE_HOME, CHRONICLE_EMBEDDINGS)
 * 3. .chroniclerc in current directory
 * 4. .chroniclerc in home directory
 * 5. Built-in defaults
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { configLogger } from "./logger.js";

const CONFIG_FILENAME = ".chroniclerc";

/**
 * Schema for .chroniclerc
 */
export const ChronicleRcSchema = z.object({
	// Storage
	stateDir: z.string().min(1).optional(),
	memoryDb: z.string().min(1).optional(),
	semanticDb: z.string().min(1).optional(),

	// Embeddings
	embeddings: z.boolean().optional(),
	model: z.string().min(1).optional(),
	embeddingCache: z.boolean().optional(),

	// Chunking (overlap < size is enforced by the chunker)
	chunkSize: z.number().int().min(1).max(8192).optional(),
	chunkOverlap: z.number().int().min(0).max(8191).optional(),

	// Indexing defaults
	indexPath: z.string().min(1).optional(),
	indexPattern: z.string().min(1).optional(),

	// Search defaults
	searchLimit: z.number().int().min(1).max(100).optional(),
	minScore: z.number().min(-1).max(1).optional(),
});

export type ChronicleRc = z.infer<typeof ChronicleRcSchema>;
export type ChronicleConfig = Required<ChronicleRc>;

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: ChronicleConfig = {
	stateDir: "~/.chronicle",
	memoryDb: "memory.db",
	semanticDb: "semantic.db",
	embeddings: true,
	model: "Xenova/all-MiniLM-L6-v2",
	embeddingCache: true,
	chunkSize: 500,
	chunkOverlap: 50,
	indexPath: "~/clawd/memory",
	indexPattern: "*.md",
	searchLimit: 5,
	minScore: 0.3,
};

let cachedConfig: ChronicleConfig | null = null;
let configLoadedFrom: string | null = null;

/**
 * Validate a parsed config object, dropping invalid keys
 */
function validateConfig(raw: unknown, filePath: string): ChronicleRc | null {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		configLogger.warn({ filePath }, "Config is not an object, ignoring");
		return null;
	}

	const candidate: Record<string, unknown> = { ...raw };
	const first = ChronicleRcSchema.safeParse(candidate);
	if (first.success) {
		return first.data;
	}

	const warnings: string[] = [];
	for (const issue of first.error.issues) {
		const key = issue.path[0];
		warnings.push(`${issue.path.join(".") || "(root)"}: ${issue.message}`);
		if (key !== undefined) {
			delete candidate[String(key)];
		}
	}
	configLogger.warn({ filePath, warnings }, "Invalid config values ignored");

	const second = ChronicleRcSchema.safeParse(candidate);
	return second.success ? second.data : null;
}

/**
 * Try to read and parse a config file
 */
function tryReadConfig(filePath: string): ChronicleRc | null {
	try {
		if (!fs.existsSync(filePath)) {
			return null;
		}

		const content = fs.readFileSync(filePath, "utf-8");
		const parsed: unknown = JSON.parse(content);
		return validateConfig(parsed, filePath);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		configLogger.warn({ filePath, error: message }, "Could not read config file, ignoring");
		return null;
	}
}

/**
 * Apply CHRONICLE_* environment overrides
 */
function applyEnvironment(config: ChronicleRc): ChronicleRc {
	const result = { ...config };

	const home = process.env.CHRONICLE_HOME;
	if (home) {
		result.stateDir = home;
	}

	const embeddings = process.env.CHRONICLE_EMBEDDINGS?.toLowerCase();
	if (embeddings === "off" || embeddings === "false" || embeddings === "0") {
		result.embeddings = false;
	} else if (embeddings === "on" || embeddings === "true" || embeddings === "1") {
		result.embeddings = true;
	}

	return result;
}

/**
 * Load configuration from .chroniclerc files and the environment
 *
 * Returns merged config with defaults
 */
export function loadConfig(forceReload = false): ChronicleConfig {
	if (cachedConfig && !forceReload) {
		return { ...cachedConfig };
	}

	let config: ChronicleRc = {};
	configLoadedFrom = null;

	// Home directory first (lower precedence)
	const homeConfigPath = path.join(os.homedir(), CONFIG_FILENAME);
	const homeConfig = tryReadConfig(homeConfigPath);
	if (homeConfig) {
		config = { ...config, ...homeConfig };
		configLoadedFrom = homeConfigPath;
	}

	const cwdConfigPath = path.join(process.cwd(), CONFIG_FILENAME);
	if (cwdConfigPath !== homeConfigPath) {
		const cwdConfig = tryReadConfig(cwdConfigPath);
		if (cwdConfig) {
			config = { ...config, ...cwdConfig };
			configLoadedFrom = cwdConfigPath;
		}
	}

	cachedConfig = { ...DEFAULT_CONFIG, ...applyEnvironment(config) };
	return { ...cachedConfig };
}

/**
 * Get the path where config was loaded from (for debugging)
 */
export function getConfigSource(): string | null {
	return configLoadedFrom;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
	cachedConfig = null;
	configLoadedFrom = null;
}

/**
 * Get default config values (for documentation)
 */
export function getDefaultConfig(): ChronicleConfig {
	return { ...DEFAULT_CONFIG };
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(p: string): string {
	if (p === "~") {
		return os.homedir();
	}
	if (p.startsWith("~/")) {
		return path.join(os.homedir(), p.slice(2));
	}
	return p;
}

/**
 * Resolve a database or cache file against the state directory
 */
export function resolveStatePath(config: Pick<ChronicleConfig, "stateDir">, file: string): string {
	const expanded = expandHome(file);
	if (path.isAbsolute(expanded)) {
		return expanded;
	}
	return path.join(expandHome(config.stateDir), expanded);
}
