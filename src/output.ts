/**
 * Unified Output System
 *
 * - Human mode: concise, colored terminal output
 * - Agent mode: one JSON event per line for machine parsing
 *
 * Auto-detects TTY to choose mode, but can be overridden with --human or
 * CHRONICLE_OUTPUT.
 */

import chalk from "chalk";

export type OutputMode = "human" | "agent";

/**
 * Structured event for agent-mode JSON output
 */
export interface OutputEvent {
	type: "info" | "success" | "error" | "warning" | "status" | "result" | "metrics" | "debug";
	message: string;
	timestamp: string;
	data?: Record<string, unknown>;
}

interface OutputConfig {
	mode: OutputMode;
	verbose: boolean;
}

const globalConfig: OutputConfig = {
	mode: detectMode(),
	verbose: false,
};

/**
 * TTY → human mode, piped or CI → agent mode
 */
function detectMode(): OutputMode {
	if (process.env.CHRONICLE_OUTPUT === "human") return "human";
	if (process.env.CHRONICLE_OUTPUT === "agent") return "agent";

	if (process.argv.includes("--human")) return "human";

	return process.stdout.isTTY ? "human" : "agent";
}

/**
 * Configure the output system
 */
export function configureOutput(config: Partial<OutputConfig>): void {
	if (config.mode !== undefined) {
		globalConfig.mode = config.mode;
	}
	if (config.verbose !== undefined) {
		globalConfig.verbose = config.verbose;
	}
}

export function getOutputMode(): OutputMode {
	return globalConfig.mode;
}

function outputEvent(event: OutputEvent): void {
	if (globalConfig.mode === "agent") {
		console.log(JSON.stringify(event));
		return;
	}

	const prefix = getHumanPrefix(event.type);
	if (event.data && globalConfig.verbose) {
		console.log(`${prefix} ${event.message}`, event.data);
	} else {
		console.log(`${prefix} ${event.message}`);
	}
}

function getHumanPrefix(type: OutputEvent["type"]): string {
	switch (type) {
		case "success":
			return chalk.green("✓");
		case "error":
			return chalk.red("✗");
		case "warning":
			return chalk.yellow("⚠");
		case "result":
			return chalk.cyan("→");
		case "metrics":
			return chalk.blue("#");
		case "debug":
			return chalk.dim("·");
		default:
			return chalk.dim("•");
	}
}

function now(): string {
	return new Date().toISOString();
}

// =============================================================================
// Public API
// =============================================================================

export function info(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "info", message, timestamp: now(), data });
}

export function success(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "success", message, timestamp: now(), data });
}

export function error(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "error", message, timestamp: now(), data });
}

export function warning(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "warning", message, timestamp: now(), data });
}

/**
 * Output a single search or listing result
 *
 * In human mode the body is printed indented below the title.
 */
export function result(title: string, body: string, data?: Record<string, unknown>): void {
	if (globalConfig.mode === "human") {
		console.log(`${getHumanPrefix("result")} ${title}`);
		for (const line of body.split("\n")) {
			console.log(`    ${line}`);
		}
		console.log();
	} else {
		outputEvent({ type: "result", message: title, timestamp: now(), data: { body, ...data } });
	}
}

/**
 * Output debug information (only in verbose mode)
 */
export function debug(message: string, data?: Record<string, unknown>): void {
	if (globalConfig.verbose) {
		outputEvent({ type: "debug", message, timestamp: now(), data });
	}
}

// =============================================================================
// Human-oriented formatting helpers
// =============================================================================

/**
 * Print a header/banner
 */
export function header(title: string, subtitle?: string): void {
	if (globalConfig.mode === "human") {
		console.log();
		console.log(chalk.cyan.bold(title));
		if (subtitle) {
			console.log(chalk.dim(`  ${subtitle}`));
		}
		console.log();
	} else {
		outputEvent({
			type: "status",
			message: title,
			timestamp: now(),
			data: subtitle ? { subtitle } : undefined,
		});
	}
}

export function section(title: string): void {
	if (globalConfig.mode === "human") {
		console.log(chalk.cyan(`\n━━━ ${title} ━━━\n`));
	} else {
		outputEvent({ type: "status", message: title, timestamp: now() });
	}
}

export function keyValue(key: string, value: string | number | boolean): void {
	if (globalConfig.mode === "human") {
		console.log(`  ${chalk.dim(`${key}:`)} ${value}`);
	} else {
		outputEvent({ type: "metrics", message: `${key}: ${value}`, timestamp: now(), data: { [key]: value } });
	}
}

export function list(items: string[], prefix = "•"): void {
	if (globalConfig.mode === "human") {
		for (const item of items) {
			console.log(`  ${chalk.dim(prefix)} ${item}`);
		}
	} else {
		outputEvent({ type: "info", message: "list", timestamp: now(), data: { items } });
	}
}
