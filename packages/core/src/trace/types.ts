import type { ModelUsage } from '../model/types.js';
import type { ToolCall } from '../model/messages.js';
import type { ToolResult } from '../tools/types.js';
import type { ParseOutcomeKind } from '../parser/types.js';

export type TerminationReason =
	| 'final_message'
	| 'iteration_limit'
	| 'time_limit'
	| 'cost_limit'
	| 'parse_failure'
	| 'fatal_error';

export type LoopState = 'init' | 'awaiting_model' | 'parsing' | 'executing_tools' | 'terminated';

/**
 * `model_timeout` marks a call cancelled at its deadline, `model_error` one
 * that failed outright. Neither has output.
 */
export type IterationOutcome = ParseOutcomeKind | 'model_timeout' | 'model_error';

export interface IterationRecord {
	/** 0-based. */
	index: number;
	startedAt: number;
	rawOutput: string;
	reasoning: string;
	outcome: IterationOutcome;
	toolCalls: readonly ToolCall[];
	toolResults: readonly ToolResult[];
	usage: ModelUsage;
	cost: number;
	durationMs: number;
}

export interface StateTransition {
	from: LoopState;
	to: LoopState;
	at: number;
	/** Iteration in progress when the transition happened. */
	iteration: number;
}

export interface Trace {
	conversationId: string;
	startedAt: number;
	endedAt: number;
	iterations: readonly IterationRecord[];
	transitions: readonly StateTransition[];
	totalCost: number;
	totalDurationMs: number;
	totalToolCalls: number;
	usage: ModelUsage;
	terminationReason: TerminationReason;
	error?: string;
}

/** Receives every finished trace together with the answer the user got. */
export interface TraceSink {
	write(trace: Trace, answer: string): Promise<void>;
}
