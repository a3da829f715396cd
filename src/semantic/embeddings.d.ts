/**
 * Type declarations for @themaximalist/embeddings.js, which ships none.
 */

declare module "@themaximalist/embeddings.js" {
	interface EmbeddingsOptions {
		service?: "transformers" | "openai" | "mistral" | "modeldeployer";
		model?: string;
		cache?: boolean;
		cache_file?: string;
	}

	/**
	 * Embed `input` with the configured service; resolves to the vector.
	 */
	function Embeddings(input: string, options?: EmbeddingsOptions): Promise<number[]>;

	export default Embeddings;
}
