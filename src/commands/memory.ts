/**
 * Memory Commands
 *
 * | Command          | Purpose                                     |
 * |------------------|---------------------------------------------|
 * | memory init      | Create the state directory and database     |
 * | memory add       | Capture a memory                            |
 * | memory search    | Substring search over memories              |
 * | memory ask       | Leave a question/answer pair                |
 * | memory asks      | List question/answer pairs                  |
 * | memory context   | Show the most recent memories               |
 * | memory stats     | Show memory statistics                      |
 */

import { loadConfig, resolveStatePath } from "../config.js";
import { getErrorMessage } from "../errors.js";
import { MemoryStore } from "../memory/index.js";
import type { Memory } from "../memory/index.js";
import { error, header, info, keyValue, result, section, success } from "../output.js";
import type { CommandModule } from "./types.js";

interface AddOptions {
	platform: string;
	project: string;
	tags?: string[];
}

interface LimitOptions {
	limit: string;
}

interface AskOptions {
	answer: string;
	memory?: string;
}

function openStore(): MemoryStore {
	const config = loadConfig();
	return new MemoryStore(resolveStatePath(config, config.memoryDb));
}

function run(label: string, action: (store: MemoryStore) => void): void {
	let store: MemoryStore | null = null;
	try {
		store = openStore();
		action(store);
	} catch (err) {
		error(`${label}: ${getErrorMessage(err)}`);
		process.exitCode = 1;
	} finally {
		store?.close();
	}
}

function parseLimit(value: string): number {
	const limit = Number.parseInt(value, 10);
	return Number.isInteger(limit) && limit > 0 ? limit : 10;
}

function printMemory(memory: Memory): void {
	const tags = memory.tags.length > 0 ? ` [${memory.tags.join(", ")}]` : "";
	result(`${memory.timestamp} ${memory.platform}/${memory.project}${tags}`, memory.content, {
		id: memory.id,
		tags: memory.tags,
	});
}

// =============================================================================
// Handlers
// =============================================================================

export function handleInit(): void {
	run("Failed to initialize", (store) => {
		success(`Memory database ready at ${store.dbPath}`, { dbPath: store.dbPath });
	});
}

export function handleAdd(content: string, options: AddOptions): void {
	run("Failed to add memory", (store) => {
		const memory = store.add({
			content,
			platform: options.platform,
			project: options.project,
			tags: options.tags,
		});
		success(`Memory saved (${memory.id})`, { id: memory.id });
	});
}

export function handleSearch(query: string, options: LimitOptions): void {
	run("Search failed", (store) => {
		const memories = store.search(query, parseLimit(options.limit));
		if (memories.length === 0) {
			info("No memories found");
			return;
		}
		header(`Memories (${memories.length})`, query);
		memories.forEach(printMemory);
	});
}

export function handleAsk(question: string, options: AskOptions): void {
	run("Failed to save question", (store) => {
		store.ask(question, options.answer, options.memory);
		success("Question saved");
	});
}

export function handleAsks(query: string | undefined): void {
	run("Failed to list questions", (store) => {
		const asks = store.getAsks(query);
		if (asks.length === 0) {
			info("No questions found");
			return;
		}
		header(`Questions (${asks.length})`);
		for (const entry of asks) {
			result(`Q: ${entry.question}`, `A: ${entry.answer}`, { timestamp: entry.timestamp, memoryId: entry.memoryId });
		}
	});
}

export function handleContext(options: LimitOptions): void {
	run("Failed to load context", (store) => {
		const memories = store.context(parseLimit(options.limit));
		if (memories.length === 0) {
			info("No memories yet");
			return;
		}
		header("Recent Memories");
		memories.forEach(printMemory);
	});
}

export function handleStats(): void {
	run("Failed to get stats", (store) => {
		const stats = store.stats();

		header("Memory Statistics");
		keyValue("Memories", stats.totalMemories);
		keyValue("Questions", stats.totalAsks);
		keyValue("Database", stats.dbPath);

		section("Platforms");
		for (const [name, count] of Object.entries(stats.platforms)) {
			keyValue(name, count);
		}
		section("Projects");
		for (const [name, count] of Object.entries(stats.projects)) {
			keyValue(name, count);
		}
	});
}

// =============================================================================
// Command Module
// =============================================================================

export const memoryCommands: CommandModule = {
	register(program) {
		const memory = program.command("memory").description("Capture and recall memories");

		memory.command("init").description("Create the memory database").action(handleInit);

		memory
			.command("add <content>")
			.description("Capture a memory")
			.option("--platform <name>", "Platform the memory came from", "cli")
			.option("--project <name>", "Project the memory belongs to", "default")
			.option("-t, --tags <tags...>", "Tags")
			.action(handleAdd);

		memory
			.command("search <query>")
			.description("Find memories containing the query")
			.option("-l, --limit <n>", "Maximum results", "10")
			.action(handleSearch);

		memory
			.command("ask <question>")
			.description("Leave a question and its answer")
			.requiredOption("-a, --answer <answer>", "Answer to the question")
			.option("--memory <id>", "Related memory id")
			.action(handleAsk);

		memory
			.command("asks [query]")
			.description("List questions, optionally filtered")
			.action(handleAsks);

		memory
			.command("context")
			.description("Show the most recent memories")
			.option("-l, --limit <n>", "Number of memories", "10")
			.action(handleContext);

		memory.command("stats").description("Show memory statistics").action(handleStats);
	},
};
