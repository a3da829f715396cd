/**
 * Memory Store Types
 */

/**
 * A captured memory
 */
export interface Memory {
	id: string;
	content: string;
	timestamp: string;
	platform: string;
	project: string;
	tags: string[];
	context: Record<string, unknown>;
}

export interface AddMemoryOptions {
	content: string;
	platform?: string; // default "unknown"
	project?: string; // default "default"
	tags?: string[];
	context?: Record<string, unknown>;
}

/**
 * A question/answer pair left for a later session
 */
export interface Ask {
	question: string;
	answer: string;
	memoryId: string | null;
	timestamp: string;
}

/**
 * Simplified memory view returned by recall()
 */
export interface RecallEntry {
	text: string;
	timestamp: string;
	source: string;
	tags: string[];
}

export interface MemoryStats {
	totalMemories: number;
	totalAsks: number;
	platforms: Record<string, number>;
	projects: Record<string, number>;
	dbPath: string;
}

export interface MemoryRow {
	id: string;
	content: string;
	timestamp: string;
	platform: string;
	project: string;
	tags: string;
	context: string;
}

export interface AskRow {
	question: string;
	answer: string;
	memory_id: string | null;
	timestamp: string;
}
