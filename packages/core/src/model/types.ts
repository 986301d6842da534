import type { JSONSchema7 } from 'json-schema';

export interface ModelUsage {
	inputTokens: number;
	outputTokens: number;
	totalTokens: number;
}

export const EMPTY_USAGE: ModelUsage = Object.freeze({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });

export type FinishReason = 'stop' | 'length' | 'content-filter' | 'tool-calls' | 'error' | 'other';

/** A tool call reported through the provider's tool-calling API. */
export interface StructuredToolCall {
	id?: string;
	name: string;
	arguments: unknown;
}

export interface ModelCompletion {
	rawText: string;
	toolCalls?: StructuredToolCall[];
	usage: ModelUsage;
	finishReason: FinishReason;
	/** Cost reported by the provider; when absent the caller prices `usage` itself. */
	costUsd?: number;
}

/** A tool as advertised to the model. */
export interface ToolSchema {
	name: string;
	description: string;
	category: string;
	parameters: JSONSchema7;
}
