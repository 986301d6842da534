import type { ChatMessage } from './messages.js';
import type { ModelCompletion, ToolSchema } from './types.js';

/** Known LLM provider identifiers. */
export type ModelProvider = 'anthropic' | 'openai' | 'google' | 'custom';

export interface CompletionOptions {
	/** Upper bound on generated tokens for this call. */
	maxTokens?: number;
	temperature?: number;
	/** Aborted when the per-call deadline passes or the run is cancelled. */
	signal?: AbortSignal;
}

export interface ChatModel {
	complete(
		messages: readonly ChatMessage[],
		tools: readonly ToolSchema[],
		options?: CompletionOptions,
	): Promise<ModelCompletion>;

	/** The model identifier string (e.g. "gpt-4o-mini"). */
	readonly modelId: string;

	readonly provider: ModelProvider;
}
