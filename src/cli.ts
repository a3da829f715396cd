#!/usr/bin/env node

/**
 * Chronicle CLI
 *
 * Commands:
 *   memory init|add|search|ask|asks|context|stats   Captured memories
 *   semantic index|search|stats                     Semantic search over files
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createProgram } from "./commands/index.js";
import { getErrorMessage } from "./errors.js";
import { logger } from "./logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Get version from package.json
function getVersion(): string {
	try {
		const pkgPath = join(__dirname, "..", "package.json");
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		logger.debug({ error: getErrorMessage(error) }, "Could not read package.json");
	}
	return "0.1.0";
}

createProgram(getVersion())
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		logger.error({ error: getErrorMessage(error) }, "Command failed");
		process.exitCode = 1;
	});
