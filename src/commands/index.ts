/**
 * Program assembly
 */

import { Command } from "commander";
import { configureOutput } from "../output.js";
import { memoryCommands } from "./memory.js";
import { semanticCommands } from "./semantic.js";
import type { CommandModule } from "./types.js";

const modules: CommandModule[] = [memoryCommands, semanticCommands];

interface GlobalOptions {
	human?: boolean;
	verbose?: boolean;
}

export function createProgram(version: string): Command {
	const program = new Command();

	program
		.name("chronicle")
		.description("Persistent memory with semantic search over local notes")
		.version(version)
		.option("--human", "Human-readable output (default when attached to a terminal)")
		.option("-v, --verbose", "Include event data in human output")
		.hook("preAction", (thisCommand) => {
			const options = thisCommand.opts<GlobalOptions>();
			configureOutput({
				...(options.human ? { mode: "human" as const } : {}),
				verbose: options.verbose ?? false,
			});
		});

	for (const commandModule of modules) {
		commandModule.register(program);
	}

	return program;
}
