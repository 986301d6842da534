import { test, expect, describe } from 'vitest';
import { BudgetTracker } from './budget.js';

function fakeClock(start = 1000) {
	let now = start;
	return {
		clock: () => now,
		advance: (ms: number) => {
			now += ms;
		},
	};
}

const limits = { maxIterations: 3, maxTimeSeconds: 10, costLimitUsd: 0.5 };

describe('BudgetTracker', () => {
	test('is within budget at the start', () => {
		const { clock } = fakeClock();
		const budget = new BudgetTracker(limits, clock);

		expect(budget.check()).toEqual({ ok: true });
		expect(budget.startedAt).toBe(1000);
	});

	test('stops once the iteration limit is reached', () => {
		const { clock } = fakeClock();
		const budget = new BudgetTracker(limits, clock);
		budget.recordIteration({ cost: 0, durationMs: 1 });
		budget.recordIteration({ cost: 0, durationMs: 1 });
		expect(budget.check()).toEqual({ ok: true });

		budget.recordIteration({ cost: 0, durationMs: 1 });
		expect(budget.check()).toEqual({ ok: false, reason: 'iteration_limit' });
	});

	test('stops once the time limit is reached', () => {
		const { clock, advance } = fakeClock();
		const budget = new BudgetTracker(limits, clock);
		advance(9999);
		expect(budget.check()).toEqual({ ok: true });

		advance(1);
		expect(budget.check()).toEqual({ ok: false, reason: 'time_limit' });
	});

	test('stops once cumulative cost reaches the limit', () => {
		const { clock } = fakeClock();
		const budget = new BudgetTracker(limits, clock);
		budget.recordIteration({ cost: 0.25, durationMs: 1 });
		expect(budget.check()).toEqual({ ok: true });

		budget.recordIteration({ cost: 0.25, durationMs: 1 });
		expect(budget.check()).toEqual({ ok: false, reason: 'cost_limit' });
	});

	test('reports iterations before time and cost', () => {
		const { clock, advance } = fakeClock();
		const budget = new BudgetTracker({ maxIterations: 1, maxTimeSeconds: 1, costLimitUsd: 0.1 }, clock);
		budget.recordIteration({ cost: 1, durationMs: 5 });
		advance(5000);

		expect(budget.check()).toEqual({ ok: false, reason: 'iteration_limit' });
	});

	test('snapshot reports counters and limits', () => {
		const { clock, advance } = fakeClock();
		const budget = new BudgetTracker(limits, clock);
		budget.recordIteration({ cost: 0.125, durationMs: 300 });
		advance(450);

		expect(budget.snapshot()).toEqual({
			...limits,
			iterationCount: 1,
			startedAt: 1000,
			elapsedMs: 450,
			cumulativeCost: 0.125,
			cumulativeModelMs: 300,
		});
	});
});
