/**
 * Logger Module
 *
 * Pino-based structured logging. Output goes to stderr so that command output
 * on stdout stays machine-readable.
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const level = process.env.CHRONICLE_LOG || process.env.LOG_LEVEL || "info";

export const logger = isDev
	? pino({
			level,
			transport: {
				target: "pino-pretty",
				options: {
					colorize: true,
					destination: 2,
					ignore: "pid,hostname",
					translateTime: "HH:MM:ss",
				},
			},
		})
	: pino({ level }, pino.destination(2));

// Child loggers for different components
export const semanticLogger = logger.child({ module: "semantic" });
export const memoryLogger = logger.child({ module: "memory" });
export const configLogger = logger.child({ module: "config" });
