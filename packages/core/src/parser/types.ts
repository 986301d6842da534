import type { ToolCall } from '../model/messages.js';

export interface FinalMessageOutcome {
	kind: 'final_message';
	/** Text before the marker. Internal only. */
	reasoning: string;
	finalMessage: string;
	/** Tool-call directives that appeared alongside the marker and were dropped. */
	discardedToolCalls: number;
}

export interface ToolCallsOutcome {
	kind: 'tool_calls';
	reasoning: string;
	toolCalls: ToolCall[];
}

export interface InconclusiveOutcome {
	kind: 'inconclusive';
	reasoning: string;
}

export type ParseOutcome = FinalMessageOutcome | ToolCallsOutcome | InconclusiveOutcome;

export type ParseOutcomeKind = ParseOutcome['kind'];
