/**
 * Tests for errors.ts
 */

import { describe, expect, it } from "vitest";
import {
	AppError,
	ChunkingConfigError,
	EmbeddingError,
	getErrorMessage,
	isAppError,
	MalformedSourceError,
	SourceNotFoundError,
	ValidationError,
} from "../errors.js";

describe("errors.ts", () => {
	it("keeps instanceof chains for subclasses", () => {
		const error = new ChunkingConfigError("bad overlap", "overlap");

		expect(error).toBeInstanceOf(ChunkingConfigError);
		expect(error).toBeInstanceOf(ValidationError);
		expect(error).toBeInstanceOf(AppError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("ChunkingConfigError");
	});

	it("assigns stable codes", () => {
		expect(new ValidationError("x", "field").code).toBe("VALIDATION_ERROR");
		expect(new ChunkingConfigError("x", "windowSize").code).toBe("CHUNKING_CONFIG");
		expect(new SourceNotFoundError("/a.md").code).toBe("NOT_FOUND");
		expect(new MalformedSourceError("/a.md", "bad").code).toBe("MALFORMED_INPUT");
		expect(new EmbeddingError("x", "model").code).toBe("EMBEDDING_ERROR");
	});

	it("builds messages from paths", () => {
		expect(new SourceNotFoundError("/a.md").message).toBe("Source not found: /a.md");
		expect(new MalformedSourceError("/a.md", "contains NUL bytes").message).toBe(
			"Cannot decode /a.md as text: contains NUL bytes",
		);
	});

	it("recognizes application errors", () => {
		expect(isAppError(new SourceNotFoundError("/a.md"))).toBe(true);
		expect(isAppError(new Error("plain"))).toBe(false);
		expect(isAppError("string")).toBe(false);
	});

	it("extracts messages from anything thrown", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
		expect(getErrorMessage("text")).toBe("text");
		expect(getErrorMessage(42)).toBe("42");
	});
});
