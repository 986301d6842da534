/**
 * Roles a conversation message can carry.
 * `assistant_internal` marks compression summaries: model-visible, never user-visible.
 */
export type MessageRole = 'system' | 'user' | 'assistant' | 'assistant_internal' | 'tool';

/** Where a tool call came from: a directive in the text, or the provider's tool-calling API. */
export type ToolCallSource = 'text' | 'structured';

export interface ToolCall {
	/** Unique within the iteration that produced it. */
	id: string;
	name: string;
	/** Raw, unvalidated arguments as the model produced them. */
	arguments: unknown;
	source: ToolCallSource;
}

export interface ChatMessage {
	role: MessageRole;
	content: string;
	/** Calls requested by an assistant message. */
	toolCalls?: readonly ToolCall[];
	/** On tool messages: the call this result answers. */
	toolCallId?: string;
	toolName?: string;
	/** On tool messages: whether the answered call came through the provider API. */
	structured?: boolean;
}

// ── Helpers ──

export function systemMessage(content: string): ChatMessage {
	return { role: 'system', content };
}

export function userMessage(content: string): ChatMessage {
	return { role: 'user', content };
}

export function assistantMessage(content: string, toolCalls?: readonly ToolCall[]): ChatMessage {
	return toolCalls && toolCalls.length > 0
		? { role: 'assistant', content, toolCalls }
		: { role: 'assistant', content };
}

export function summaryMessage(content: string): ChatMessage {
	return { role: 'assistant_internal', content };
}

export function toolResultMessage(call: ToolCall, content: string): ChatMessage {
	return {
		role: 'tool',
		content,
		toolCallId: call.id,
		toolName: call.name,
		structured: call.source === 'structured',
	};
}
