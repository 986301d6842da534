import type { BudgetLimits, BudgetSnapshot, BudgetVerdict } from './types.js';
import type { Clock } from '../types.js';

/**
 * Iteration, wall-clock and cost limits for one run. `check` runs before
 * every model call; limits are tested in the order iteration, time, cost.
 */
export class BudgetTracker {
	readonly startedAt: number;
	private iterations = 0;
	private cost = 0;
	private modelMs = 0;

	constructor(
		readonly limits: BudgetLimits,
		private readonly clock: Clock = Date.now,
	) {
		this.startedAt = clock();
	}

	get iterationCount(): number {
		return this.iterations;
	}

	get cumulativeCost(): number {
		return this.cost;
	}

	elapsedMs(): number {
		return this.clock() - this.startedAt;
	}

	check(): BudgetVerdict {
		if (this.iterations >= this.limits.maxIterations) {
			return { ok: false, reason: 'iteration_limit' };
		}
		if (this.elapsedMs() >= this.limits.maxTimeSeconds * 1000) {
			return { ok: false, reason: 'time_limit' };
		}
		if (this.cost >= this.limits.costLimitUsd) {
			return { ok: false, reason: 'cost_limit' };
		}
		return { ok: true };
	}

	/** Counts one consumed iteration with the measured cost of its model call. */
	recordIteration(entry: { cost: number; durationMs: number }): void {
		this.iterations++;
		this.cost += entry.cost;
		this.modelMs += entry.durationMs;
	}

	snapshot(): BudgetSnapshot {
		return {
			...this.limits,
			iterationCount: this.iterations,
			startedAt: this.startedAt,
			elapsedMs: this.elapsedMs(),
			cumulativeCost: this.cost,
			cumulativeModelMs: this.modelMs,
		};
	}
}
