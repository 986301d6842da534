import { test, expect, describe, beforeAll } from 'vitest';
import chalk from 'chalk';
import type { IterationRecord, Trace } from 'sous';
import { describeIteration, describeTermination, describeTrace } from './display.js';

beforeAll(() => {
	chalk.level = 0;
});

function makeRecord(overrides: Partial<IterationRecord> = {}): IterationRecord {
	return {
		index: 0,
		startedAt: 0,
		rawOutput: '',
		reasoning: '',
		outcome: 'tool_calls',
		toolCalls: [],
		toolResults: [],
		usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
		cost: 0,
		durationMs: 812,
		...overrides,
	};
}

describe('describeIteration', () => {
	test('lists reasoning and tool results', () => {
		const lines = describeIteration(
			makeRecord({
				reasoning: 'Need recipes first.',
				toolResults: [
					{
						callId: 'a',
						toolName: 'search_recipes',
						success: true,
						payload: '[]',
						metadata: { durationMs: 3.2831, truncated: false, originalLength: 2 },
					},
					{
						callId: 'b',
						toolName: 'get_recipe_details',
						success: false,
						errorKind: 'ExecutionError',
						message: 'No recipe with id "x"',
						metadata: { durationMs: 1, truncated: false, originalLength: 21 },
					},
				],
			}),
		);

		expect(lines).toEqual([
			'Step 1 tools 812ms',
			'  thinking: Need recipes first.',
			'  ✓ search_recipes 3ms',
			'  ✗ get_recipe_details ExecutionError: No recipe with id "x"',
		]);
	});

	test('labels timeouts', () => {
		expect(describeIteration(makeRecord({ index: 2, outcome: 'model_timeout' }))).toEqual(['Step 3 timed out 812ms']);
	});

	test('labels failed model calls', () => {
		expect(describeIteration(makeRecord({ outcome: 'model_error', durationMs: 40.6 }))).toEqual([
			'Step 1 model failed 41ms',
		]);
	});
});

describe('describeTrace', () => {
	test('summarizes a run', () => {
		const trace: Trace = {
			conversationId: 'c',
			startedAt: 0,
			endedAt: 2500,
			iterations: [makeRecord(), makeRecord({ index: 1, outcome: 'final_message' })],
			transitions: [],
			totalCost: 0.00123,
			totalDurationMs: 2500,
			totalToolCalls: 2,
			usage: { inputTokens: 1500, outputTokens: 200, totalTokens: 1700 },
			terminationReason: 'final_message',
		};

		expect(describeTrace(trace).slice(2, -1)).toEqual([
			'  Outcome:       answered',
			'  Steps:         2',
			'  Tool calls:    2',
			'  Duration:      2.5s',
			'  Input tokens:  1,500',
			'  Output tokens: 200',
			'  Total cost:    $0.0012',
		]);
	});

	test('describes termination reasons', () => {
		expect(describeTermination('cost_limit')).toBe('cost limit reached');
	});
});
