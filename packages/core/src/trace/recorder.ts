import type { Clock } from '../types.js';
import { SousError } from '../errors.js';
import type {
	IterationRecord,
	LoopState,
	StateTransition,
	TerminationReason,
	Trace,
} from './types.js';

/**
 * Append-only log of one run. It observes the loop and never feeds back
 * into it.
 */
export class TraceRecorder {
	readonly startedAt: number;
	private readonly iterations: IterationRecord[] = [];
	private readonly transitions: StateTransition[] = [];
	private finished: Trace | undefined;

	constructor(
		readonly conversationId: string,
		private readonly clock: Clock = Date.now,
	) {
		this.startedAt = clock();
	}

	get iterationCount(): number {
		return this.iterations.length;
	}

	get isFinished(): boolean {
		return this.finished !== undefined;
	}

	recordTransition(from: LoopState, to: LoopState, iteration: number): void {
		this.assertOpen();
		this.transitions.push(Object.freeze({ from, to, at: this.clock(), iteration }));
	}

	recordIteration(record: IterationRecord): void {
		this.assertOpen();
		if (record.index !== this.iterations.length) {
			throw new SousError(
				`Iteration ${record.index} recorded out of order (expected ${this.iterations.length})`,
			);
		}
		this.iterations.push(
			Object.freeze({
				...record,
				toolCalls: Object.freeze([...record.toolCalls]),
				toolResults: Object.freeze([...record.toolResults]),
			}),
		);
	}

	/** Seals the log. Can be called once. */
	finish(terminationReason: TerminationReason, error?: string): Trace {
		this.assertOpen();
		const endedAt = this.clock();

		let inputTokens = 0;
		let outputTokens = 0;
		let totalCost = 0;
		let totalToolCalls = 0;
		for (const iteration of this.iterations) {
			inputTokens += iteration.usage.inputTokens;
			outputTokens += iteration.usage.outputTokens;
			totalCost += iteration.cost;
			totalToolCalls += iteration.toolCalls.length;
		}

		const trace: Trace = Object.freeze({
			conversationId: this.conversationId,
			startedAt: this.startedAt,
			endedAt,
			iterations: Object.freeze([...this.iterations]),
			transitions: Object.freeze([...this.transitions]),
			totalCost,
			totalDurationMs: endedAt - this.startedAt,
			totalToolCalls,
			usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
			terminationReason,
			...(error !== undefined ? { error } : {}),
		});
		this.finished = trace;
		return trace;
	}

	private assertOpen(): void {
		if (this.finished) {
			throw new SousError(`Trace for ${this.conversationId} is already finished`);
		}
	}
}
