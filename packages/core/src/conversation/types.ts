import type { ChatMessage, MessageRole, ToolCall } from '../model/messages.js';
import type { Clock } from '../types.js';

/** A conversation entry. Frozen once appended. */
export interface ContextMessage extends ChatMessage {
	readonly tokenCount: number;
	readonly timestamp: number;
}

export type Tokenizer = (text: string) => number;

export interface ConversationContextOptions {
	maxTokens: number;
	/** Fraction of `maxTokens` above which compression runs. */
	compressionThreshold?: number;
	/** Most recent messages kept verbatim by compression. */
	keepRecent?: number;
	/** Share of `maxTokens` a compression summary may occupy. */
	summaryShare?: number;
	tokenizer?: Tokenizer;
	clock?: Clock;
}

export interface CompressionReport {
	compressed: boolean;
	removedMessages: number;
	tokensBefore: number;
	tokensAfter: number;
}

export interface TokenUsage {
	current: number;
	max: number;
	percentage: number;
	compressionCount: number;
	messageCount: number;
}

export interface SerializedMessage {
	role: MessageRole;
	content: string;
	tokenCount: number;
	timestamp: string;
	toolCalls?: ToolCall[];
	toolCallId?: string;
	toolName?: string;
}

export interface ConversationExport {
	maxTokens: number;
	tokenTotal: number;
	compressionCount: number;
	messages: SerializedMessage[];
}
