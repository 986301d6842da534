import type { ChatModel } from '../model/interface.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { IterationRecord, TerminationReason, Trace, TraceSink } from '../trace/types.js';
import type { PricingTable } from '../metering/types.js';
import type { ChatMessage } from '../model/messages.js';
import type { Tokenizer } from '../conversation/types.js';
import type { Clock } from '../types.js';
import type { InstructionBuilderOptions } from './instructions.js';

/**
 * Settings fixed when the loop is constructed. `maxIterations: 1` gives the
 * single-pass (direct) mode.
 */
export interface LoopSettings {
	maxIterations: number;
	maxTimeSeconds: number;
	maxTokensPerCall: number;
	costLimitUsd: number;

	contextMaxTokens: number;
	compressionThreshold: number;
	keepRecentMessages: number;
	summaryShare: number;

	/** Per-call deadline, independent of the overall time budget. */
	modelTimeoutMs: number;
	/** Consecutive timed-out calls retried before the run fails. */
	maxModelTimeoutRetries: number;
	/** Consecutive throttled calls retried before the run fails. */
	maxThrottleRetries: number;
	/** Consecutive outputs with neither tool calls nor a final message tolerated. */
	maxConsecutiveInconclusive: number;
	maxToolPayloadChars: number;
	temperature: number;
}

export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
	maxIterations: 20,
	maxTimeSeconds: 60,
	maxTokensPerCall: 4096,
	costLimitUsd: 0.5,

	contextMaxTokens: 8000,
	compressionThreshold: 0.85,
	keepRecentMessages: 6,
	summaryShare: 0.15,

	modelTimeoutMs: 30_000,
	maxModelTimeoutRetries: 2,
	maxThrottleRetries: 3,
	maxConsecutiveInconclusive: 3,
	maxToolPayloadChars: 4000,
	temperature: 0.7,
};

export interface IterationEvent {
	conversationId: string;
	record: IterationRecord;
}

export interface OrchestrationLoopOptions {
	model: ChatModel;
	/** Sealed by the loop if it is not already. */
	registry: ToolRegistry;
	/** Defaults to an executor over `registry`. */
	executor?: ToolExecutor;
	sink?: TraceSink;
	settings?: Partial<LoopSettings>;
	/** Shapes the pinned system prompt; defaults to the built-in template. */
	instructions?: InstructionBuilderOptions;
	pricing?: PricingTable;
	tokenizer?: Tokenizer;
	clock?: Clock;
	/** Pause before retrying a throttled call, when the provider gave no hint. */
	throttleBackoffMs?: number;
	onIteration?: (event: IterationEvent) => void;
}

export interface RunOptions {
	conversationId?: string;
	/** Aborting ends the run at the next iteration boundary (or cancels the in-flight model call). */
	signal?: AbortSignal;
	/** Earlier turns of a short-lived session, placed between the system prompt and the new message. */
	history?: readonly ChatMessage[];
	/** Extra facts about the user appended to the system prompt for this run. */
	userContext?: string;
}

export interface RunResult {
	conversationId: string;
	/** Exactly one user-visible reply. */
	answer: string;
	terminationReason: TerminationReason;
	trace: Trace;
}
