/**
 * Tests for config.ts
 *
 * Tests configuration loading, merging, file precedence, environment
 * overrides and validation with mock fs.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

// Mock state
const mockFiles = new Map<string, string>();
let mockCwd = "/project";
let mockHomedir = "/home/user";

vi.mock("node:os", () => ({
	homedir: vi.fn(() => mockHomedir),
}));

vi.mock("node:fs", () => ({
	existsSync: vi.fn((path: string): boolean => mockFiles.has(path)),
	readFileSync: vi.fn((path: string, _encoding: string): string => {
		const content = mockFiles.get(path);
		if (content === undefined) {
			throw new Error(`ENOENT: no such file or directory, open '${path}'`);
		}
		return content;
	}),
}));

vi.mock("../logger.js", () => ({
	configLogger: { warn: vi.fn(), debug: vi.fn(), info: vi.fn() },
}));

// Import after mocking
import {
	clearConfigCache,
	expandHome,
	getConfigSource,
	getDefaultConfig,
	loadConfig,
	resolveStatePath,
} from "../config.js";
import { configLogger } from "../logger.js";

describe("config.ts", () => {
	beforeEach(() => {
		mockFiles.clear();
		mockCwd = "/project";
		mockHomedir = "/home/user";
		vi.spyOn(process, "cwd").mockImplementation(() => mockCwd);
		vi.stubEnv("CHRONICLE_HOME", "");
		vi.stubEnv("CHRONICLE_EMBEDDINGS", "");
		clearConfigCache();
		vi.clearAllMocks();
	});

	afterEach(() => {
		clearConfigCache();
		vi.unstubAllEnvs();
	});

	describe("loadConfig", () => {
		it("returns defaults when no config files exist", () => {
			const config = loadConfig();

			expect(config).toEqual({
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
			});
			expect(getConfigSource()).toBeNull();
		});

		it("reads the home config", () => {
			mockFiles.set("/home/user/.chroniclerc", JSON.stringify({ searchLimit: 8, embeddings: false }));

			const config = loadConfig();

			expect(config.searchLimit).toBe(8);
			expect(config.embeddings).toBe(false);
			expect(getConfigSource()).toBe("/home/user/.chroniclerc");
		});

		it("lets the project config override the home config", () => {
			mockFiles.set("/home/user/.chroniclerc", JSON.stringify({ searchLimit: 8, chunkSize: 200 }));
			mockFiles.set("/project/.chroniclerc", JSON.stringify({ searchLimit: 3 }));

			const config = loadConfig();

			expect(config.searchLimit).toBe(3);
			expect(config.chunkSize).toBe(200);
			expect(getConfigSource()).toBe("/project/.chroniclerc");
		});

		it("reads the file once when cwd is the home directory", () => {
			mockCwd = "/home/user";
			mockFiles.set("/home/user/.chroniclerc", JSON.stringify({ minScore: 0.5 }));

			expect(loadConfig().minScore).toBe(0.5);
			expect(getConfigSource()).toBe("/home/user/.chroniclerc");
		});

		it("drops invalid values and keeps valid ones", () => {
			mockFiles.set("/project/.chroniclerc", JSON.stringify({ chunkSize: -5, searchLimit: 7, minScore: "high" }));

			const config = loadConfig();

			expect(config.chunkSize).toBe(500);
			expect(config.minScore).toBe(0.3);
			expect(config.searchLimit).toBe(7);
			expect(configLogger.warn).toHaveBeenCalledTimes(1);
		});

		it("ignores malformed JSON", () => {
			mockFiles.set("/project/.chroniclerc", "{ not json");

			expect(loadConfig()).toEqual(getDefaultConfig());
			expect(getConfigSource()).toBeNull();
		});

		it("ignores a config that is not an object", () => {
			mockFiles.set("/project/.chroniclerc", "[1, 2]");

			expect(loadConfig()).toEqual(getDefaultConfig());
		});

		it("applies CHRONICLE_HOME over the files", () => {
			mockFiles.set("/project/.chroniclerc", JSON.stringify({ stateDir: "/from/file" }));
			vi.stubEnv("CHRONICLE_HOME", "/from/env");

			expect(loadConfig().stateDir).toBe("/from/env");
		});

		it("parses CHRONICLE_EMBEDDINGS", () => {
			vi.stubEnv("CHRONICLE_EMBEDDINGS", "off");
			expect(loadConfig(true).embeddings).toBe(false);

			mockFiles.set("/project/.chroniclerc", JSON.stringify({ embeddings: false }));
			vi.stubEnv("CHRONICLE_EMBEDDINGS", "1");
			expect(loadConfig(true).embeddings).toBe(true);
		});

		it("caches until forced to reload", () => {
			expect(loadConfig().searchLimit).toBe(5);

			mockFiles.set("/project/.chroniclerc", JSON.stringify({ searchLimit: 9 }));

			expect(loadConfig().searchLimit).toBe(5);
			expect(loadConfig(true).searchLimit).toBe(9);
		});

		it("returns a copy callers cannot mutate", () => {
			const config = loadConfig();
			config.searchLimit = 99;

			expect(loadConfig().searchLimit).toBe(5);
		});
	});

	describe("paths", () => {
		it("expands a leading tilde", () => {
			expect(expandHome("~")).toBe("/home/user");
			expect(expandHome("~/notes")).toBe("/home/user/notes");
			expect(expandHome("/abs/~/path")).toBe("/abs/~/path");
		});

		it("resolves state files against the state directory", () => {
			expect(resolveStatePath({ stateDir: "~/.chronicle" }, "memory.db")).toBe("/home/user/.chronicle/memory.db");
			expect(resolveStatePath({ stateDir: "/state" }, "/elsewhere/semantic.db")).toBe("/elsewhere/semantic.db");
		});
	});
});
