import type { ChatModel } from '../model/interface.js';
import type { ModelCompletion, ToolSchema } from '../model/types.js';
import { EMPTY_USAGE } from '../model/types.js';
import {
	assistantMessage,
	systemMessage,
	toolResultMessage,
	userMessage,
	type ChatMessage,
} from '../model/messages.js';
import type { ToolRegistry } from '../tools/registry.js';
import { ToolExecutor } from '../tools/executor.js';
import { renderToolResult, type ToolResult } from '../tools/types.js';
import { ConversationContext } from '../conversation/context.js';
import { ResponseParser } from '../parser/response-parser.js';
import { BudgetTracker } from '../metering/budget.js';
import { UsageMeter } from '../metering/meter.js';
import type { PricingTable } from '../metering/types.js';
import { TraceRecorder } from '../trace/recorder.js';
import type {
	IterationRecord,
	LoopState,
	TerminationReason,
	Trace,
	TraceSink,
} from '../trace/types.js';
import {
	ContextOverflowError,
	IllegalTransitionError,
	ModelThrottledError,
	ModelTimeoutError,
	OperationCancelledError,
} from '../errors.js';
import { backoffDelay, generateId, sleep, withDeadline } from '../utils.js';
import { createLogger, errorMessage } from '../logging.js';
import type { Clock } from '../types.js';
import type { Tokenizer } from '../conversation/types.js';
import { InstructionBuilder } from './instructions.js';
import {
	DEFAULT_LOOP_SETTINGS,
	type IterationEvent,
	type LoopSettings,
	type OrchestrationLoopOptions,
	type RunOptions,
	type RunResult,
} from './types.js';

const logger = createLogger('loop');

const TRANSITIONS: Record<LoopState, readonly LoopState[]> = {
	init: ['awaiting_model', 'terminated'],
	awaiting_model: ['parsing', 'terminated'],
	parsing: ['executing_tools', 'awaiting_model', 'terminated'],
	executing_tools: ['awaiting_model', 'terminated'],
	terminated: [],
};

export function resolveSettings(overrides: Partial<LoopSettings> = {}): LoopSettings {
	const settings: LoopSettings = { ...DEFAULT_LOOP_SETTINGS };
	for (const key of Object.keys(overrides)) {
		if (!isSettingKey(key)) continue;
		const value = overrides[key];
		if (value !== undefined) settings[key] = value;
	}
	return settings;
}

function isSettingKey(key: string): key is keyof LoopSettings {
	return key in DEFAULT_LOOP_SETTINGS;
}

/** Iteration whose model call produced no output. */
function failedCall(
	index: number,
	startedAt: number,
	outcome: 'model_timeout' | 'model_error',
	durationMs: number,
): IterationRecord {
	return {
		index,
		startedAt,
		rawOutput: '',
		reasoning: '',
		outcome,
		toolCalls: [],
		toolResults: [],
		usage: EMPTY_USAGE,
		cost: 0,
		durationMs,
	};
}

interface Termination {
	reason: TerminationReason;
	answer: string;
	error?: string;
}

/** Collaborators shared by every run of one loop. */
interface RunDependencies {
	model: ChatModel;
	registry: ToolRegistry;
	executor: ToolExecutor;
	parser: ResponseParser;
	instructions: InstructionBuilder;
	pricing?: PricingTable;
	tokenizer?: Tokenizer;
	clock: Clock;
	throttleBackoffMs: number;
	onIteration?: (event: IterationEvent) => void;
}

// ── OrchestrationLoop ──

/**
 * Drives one conversation at a time from a user message to exactly one
 * reply: model call, parse, tools, repeat, within the configured budgets.
 * A single loop instance may serve concurrent runs; each run owns its own
 * context, budget and trace.
 */
export class OrchestrationLoop {
	readonly settings: LoopSettings;
	private readonly deps: RunDependencies;
	private readonly sink?: TraceSink;

	constructor(options: OrchestrationLoopOptions) {
		this.settings = resolveSettings(options.settings);
		const registry = options.registry.seal();
		this.deps = {
			model: options.model,
			registry,
			executor:
				options.executor ??
				new ToolExecutor(registry, { maxPayloadChars: this.settings.maxToolPayloadChars }),
			parser: new ResponseParser(),
			instructions: new InstructionBuilder(registry, options.instructions),
			pricing: options.pricing,
			tokenizer: options.tokenizer,
			clock: options.clock ?? Date.now,
			throttleBackoffMs: options.throttleBackoffMs ?? 1000,
			onIteration: options.onIteration,
		};
		this.sink = options.sink;
	}

	async run(message: string, options: RunOptions = {}): Promise<RunResult> {
		const conversationId = options.conversationId ?? generateId();
		const run = new LoopRun(this.deps, this.settings, conversationId, options);

		logger.debug('Run started', { conversation: conversationId, model: this.deps.model.modelId });
		const termination = await run.execute(message);
		const trace = run.finish(termination);

		logger.info('Run finished', {
			conversation: conversationId,
			reason: termination.reason,
			iterations: trace.iterations.length,
			cost: trace.totalCost.toFixed(4),
		});

		await this.deliver(trace, termination.answer);
		return { conversationId, answer: termination.answer, terminationReason: termination.reason, trace };
	}

	private async deliver(trace: Trace, answer: string): Promise<void> {
		if (!this.sink) return;
		try {
			await this.sink.write(trace, answer);
		} catch (error) {
			logger.warn(`Trace sink failed: ${errorMessage(error)}`, { conversation: trace.conversationId });
		}
	}
}

// ── LoopRun ──

/** State of a single `run()` call. */
class LoopRun {
	private state: LoopState = 'init';
	private readonly context: ConversationContext;
	private readonly budget: BudgetTracker;
	private readonly meter: UsageMeter;
	private readonly recorder: TraceRecorder;
	private readonly results: ToolResult[] = [];
	private readonly signal?: AbortSignal;
	private tools: ToolSchema[] = [];

	constructor(
		private readonly deps: RunDependencies,
		private readonly settings: LoopSettings,
		private readonly conversationId: string,
		private readonly options: RunOptions,
	) {
		this.signal = options.signal;
		this.context = new ConversationContext({
			maxTokens: this.settings.contextMaxTokens,
			compressionThreshold: this.settings.compressionThreshold,
			keepRecent: this.settings.keepRecentMessages,
			summaryShare: this.settings.summaryShare,
			tokenizer: this.deps.tokenizer,
			clock: this.deps.clock,
		});
		this.budget = new BudgetTracker(
			{
				maxIterations: this.settings.maxIterations,
				maxTimeSeconds: this.settings.maxTimeSeconds,
				costLimitUsd: this.settings.costLimitUsd,
			},
			this.deps.clock,
		);
		this.meter = new UsageMeter(this.deps.pricing, this.deps.clock);
		this.recorder = new TraceRecorder(conversationId, this.deps.clock);
	}

	async execute(message: string): Promise<Termination> {
		const { instructions, registry } = this.deps;

		this.context.add(systemMessage(instructions.build(this.options.userContext)));
		for (const earlier of this.options.history ?? []) {
			this.context.add(earlier);
		}
		this.context.add(userMessage(message));
		this.tools = registry.exportSchema();

		let timeouts = 0;
		let throttles = 0;
		let inconclusive = 0;

		for (;;) {
			const iteration = this.recorder.iterationCount;

			const verdict = this.budget.check();
			if (!verdict.ok) {
				logger.info(`Budget exhausted: ${verdict.reason}`, { conversation: this.conversationId });
				return this.terminate({
					reason: verdict.reason,
					answer: InstructionBuilder.fallbackAnswer(verdict.reason, this.results),
				});
			}

			if (this.signal?.aborted) {
				return this.fail('cancelled');
			}

			try {
				this.context.compressIfNeeded();
			} catch (error) {
				if (error instanceof ContextOverflowError) {
					logger.warn(error.message, { conversation: this.conversationId });
					return this.fail(error.message);
				}
				throw error;
			}

			this.enter('awaiting_model');
			logger.debug(`Iteration ${iteration}`, {
				conversation: this.conversationId,
				tokens: this.context.tokenTotal,
			});

			const startedAt = this.deps.clock();
			let completion: ModelCompletion;
			try {
				completion = await this.callModel();
			} catch (error) {
				const durationMs = this.deps.clock() - startedAt;

				if (error instanceof ModelTimeoutError) {
					timeouts++;
					this.budget.recordIteration({ cost: 0, durationMs });
					this.record(failedCall(iteration, startedAt, 'model_timeout', durationMs));
					if (timeouts > this.settings.maxModelTimeoutRetries) {
						return this.fail(`model timed out ${timeouts} consecutive time(s)`);
					}
					logger.warn(`Model call timed out, retrying (${timeouts}/${this.settings.maxModelTimeoutRetries})`, {
						conversation: this.conversationId,
					});
					continue;
				}

				if (error instanceof OperationCancelledError) {
					return this.fail('cancelled');
				}

				if (error instanceof ModelThrottledError && throttles < this.settings.maxThrottleRetries) {
					const waitMs =
						error.retryAfterMs ?? backoffDelay(throttles, { initialDelayMs: this.deps.throttleBackoffMs });
					throttles++;
					logger.warn(`Rate limited, waiting ${waitMs}ms before retry`, { conversation: this.conversationId });
					try {
						await sleep(waitMs, this.signal);
					} catch (sleepError) {
						if (sleepError instanceof OperationCancelledError) return this.fail('cancelled');
						throw sleepError;
					}
					continue;
				}

				this.budget.recordIteration({ cost: 0, durationMs });
				this.record(failedCall(iteration, startedAt, 'model_error', durationMs));
				return this.fail(`model call failed: ${errorMessage(error)}`);
			}

			timeouts = 0;
			throttles = 0;
			const durationMs = this.deps.clock() - startedAt;
			const cost = this.meter.record({
				modelId: this.deps.model.modelId,
				iteration,
				inputTokens: completion.usage.inputTokens,
				outputTokens: completion.usage.outputTokens,
				reportedCost: completion.costUsd,
			});
			this.budget.recordIteration({ cost, durationMs });

			this.enter('parsing');
			const outcome = this.deps.parser.parse(completion, iteration);
			const base = {
				index: iteration,
				startedAt,
				rawOutput: completion.rawText,
				reasoning: outcome.reasoning,
				usage: completion.usage,
				cost,
				durationMs,
			};

			if (outcome.kind === 'final_message' && outcome.finalMessage.length > 0) {
				this.context.add(assistantMessage(completion.rawText));
				this.record({ ...base, outcome: 'final_message', toolCalls: [], toolResults: [] });
				return this.terminate({ reason: 'final_message', answer: outcome.finalMessage });
			}

			if (outcome.kind === 'tool_calls') {
				inconclusive = 0;
				this.context.add(assistantMessage(completion.rawText, outcome.toolCalls));

				this.enter('executing_tools');
				const results = await this.deps.executor.executeAll(outcome.toolCalls, {
					conversationId: this.conversationId,
					iteration,
					signal: this.signal,
				});
				outcome.toolCalls.forEach((call, i) => {
					const result = results[i];
					if (result) this.context.add(toolResultMessage(call, renderToolResult(result)));
				});
				this.results.push(...results);
				this.record({ ...base, outcome: 'tool_calls', toolCalls: outcome.toolCalls, toolResults: results });
				continue;
			}

			// Inconclusive, or a final-message marker with nothing after it.
			inconclusive++;
			if (completion.rawText.trim()) {
				this.context.add(assistantMessage(completion.rawText));
			}
			this.record({ ...base, outcome: 'inconclusive', toolCalls: [], toolResults: [] });

			if (inconclusive >= this.settings.maxConsecutiveInconclusive) {
				logger.warn(`No usable output after ${inconclusive} consecutive attempts`, {
					conversation: this.conversationId,
				});
				return this.terminate({ reason: 'parse_failure', answer: InstructionBuilder.APOLOGY });
			}

			this.context.add(
				systemMessage(InstructionBuilder.correctiveNote(inconclusive, this.settings.maxConsecutiveInconclusive)),
			);
			this.enter('awaiting_model');
		}
	}

	finish(termination: Termination): Trace {
		return this.recorder.finish(termination.reason, termination.error);
	}

	private callModel(): Promise<ModelCompletion> {
		const { model } = this.deps;
		const messages: readonly ChatMessage[] = this.context.snapshotForModel();
		return withDeadline(
			(signal) =>
				model.complete(messages, this.tools, {
					maxTokens: this.settings.maxTokensPerCall,
					temperature: this.settings.temperature,
					signal,
				}),
			this.settings.modelTimeoutMs,
			this.signal,
		);
	}

	private record(record: IterationRecord): void {
		this.recorder.recordIteration(record);
		const { onIteration } = this.deps;
		if (!onIteration) return;
		try {
			onIteration({ conversationId: this.conversationId, record });
		} catch (error) {
			logger.warn(`onIteration callback threw: ${errorMessage(error)}`);
		}
	}

	private enter(next: LoopState): void {
		if (next === this.state) return;
		if (!TRANSITIONS[this.state].includes(next)) {
			throw new IllegalTransitionError(this.state, next);
		}
		this.recorder.recordTransition(this.state, next, this.recorder.iterationCount);
		this.state = next;
	}

	private terminate(termination: Termination): Termination {
		this.enter('terminated');
		return termination;
	}

	private fail(error: string): Termination {
		if (error !== 'cancelled') {
			logger.error(`Run failed: ${error}`, { conversation: this.conversationId });
		}
		return this.terminate({ reason: 'fatal_error', answer: InstructionBuilder.APOLOGY, error });
	}
}
