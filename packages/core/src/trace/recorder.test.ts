import { test, expect, describe, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TraceRecorder } from './recorder.js';
import { JsonFileTraceSink, MemoryTraceSink, serializeTrace } from './sink.js';
import type { IterationRecord } from './types.js';
import { SousError } from '../errors.js';

// ── Helpers ──

function fakeClock(start = 0) {
	let now = start;
	return {
		clock: () => now,
		advance: (ms: number) => {
			now += ms;
		},
	};
}

function makeIteration(index: number, overrides: Partial<IterationRecord> = {}): IterationRecord {
	return {
		index,
		startedAt: 0,
		rawOutput: '',
		reasoning: '',
		outcome: 'inconclusive',
		toolCalls: [],
		toolResults: [],
		usage: { inputTokens: 100, outputTokens: 20, totalTokens: 120 },
		cost: 0.01,
		durationMs: 5,
		...overrides,
	};
}

// ── Tests ──

describe('TraceRecorder', () => {
	test('aggregates iterations when finished', () => {
		const { clock, advance } = fakeClock(1000);
		const recorder = new TraceRecorder('conv-1', clock);
		recorder.recordTransition('init', 'awaiting_model', 0);
		recorder.recordIteration(
			makeIteration(0, {
				outcome: 'tool_calls',
				toolCalls: [
					{ id: 'a', name: 'search_recipes', arguments: {}, source: 'text' },
					{ id: 'b', name: 'analyze_nutrition', arguments: {}, source: 'text' },
				],
			}),
		);
		recorder.recordIteration(makeIteration(1, { outcome: 'final_message', cost: 0.02 }));
		advance(250);

		const trace = recorder.finish('final_message');

		expect(trace.conversationId).toBe('conv-1');
		expect(trace.startedAt).toBe(1000);
		expect(trace.endedAt).toBe(1250);
		expect(trace.totalDurationMs).toBe(250);
		expect(trace.totalToolCalls).toBe(2);
		expect(trace.totalCost).toBeCloseTo(0.03);
		expect(trace.usage).toEqual({ inputTokens: 200, outputTokens: 40, totalTokens: 240 });
		expect(trace.transitions).toEqual([{ from: 'init', to: 'awaiting_model', at: 1000, iteration: 0 }]);
		expect(trace.terminationReason).toBe('final_message');
		expect('error' in trace).toBe(false);
	});

	test('keeps the error of a fatal run', () => {
		const recorder = new TraceRecorder('conv-2', () => 0);
		expect(recorder.finish('fatal_error', 'model call failed').error).toBe('model call failed');
	});

	test('rejects iterations recorded out of order', () => {
		const recorder = new TraceRecorder('conv-3', () => 0);
		expect(() => recorder.recordIteration(makeIteration(1))).toThrow(SousError);
	});

	test('is append-only', () => {
		const recorder = new TraceRecorder('conv-4', () => 0);
		recorder.recordIteration(makeIteration(0));
		const trace = recorder.finish('iteration_limit');

		expect(Object.isFrozen(trace)).toBe(true);
		expect(Object.isFrozen(trace.iterations)).toBe(true);
		expect(Object.isFrozen(trace.iterations[0])).toBe(true);
	});

	test('cannot be written to after finishing', () => {
		const recorder = new TraceRecorder('conv-5', () => 0);
		recorder.finish('time_limit');

		expect(recorder.isFinished).toBe(true);
		expect(() => recorder.recordIteration(makeIteration(0))).toThrow('already finished');
		expect(() => recorder.recordTransition('init', 'terminated', 0)).toThrow('already finished');
		expect(() => recorder.finish('time_limit')).toThrow('already finished');
	});
});

describe('trace sinks', () => {
	let dir: string | undefined;

	afterEach(async () => {
		if (dir) await rm(dir, { recursive: true, force: true });
		dir = undefined;
	});

	test('serializeTrace renders timestamps as ISO strings', () => {
		const recorder = new TraceRecorder('conv-6', () => 0);
		recorder.recordTransition('init', 'awaiting_model', 0);
		recorder.recordIteration(makeIteration(0));
		const json = serializeTrace(recorder.finish('cost_limit'), 'sorry');

		expect(json.answer).toBe('sorry');
		expect(json.startedAt).toBe('1970-01-01T00:00:00.000Z');
		expect(json.transitions).toEqual([
			{ from: 'init', to: 'awaiting_model', at: '1970-01-01T00:00:00.000Z', iteration: 0 },
		]);
	});

	test('MemoryTraceSink keeps every entry', async () => {
		const sink = new MemoryTraceSink();
		const trace = new TraceRecorder('conv-7', () => 0).finish('final_message');
		await sink.write(trace, 'done');

		expect(sink.entries).toHaveLength(1);
		expect(sink.last).toEqual({ trace, answer: 'done' });
	});

	test('JsonFileTraceSink writes one file per trace', async () => {
		dir = await mkdtemp(join(tmpdir(), 'sous-trace-'));
		const sink = new JsonFileTraceSink(join(dir, 'nested'));
		const trace = new TraceRecorder('conv-8', () => 1234).finish('final_message');

		await sink.write(trace, 'enjoy');

		expect(sink.pathFor(trace)).toBe(join(dir, 'nested', 'conv-8-1234.json'));
		const stored: unknown = JSON.parse(await readFile(sink.pathFor(trace), 'utf-8'));
		expect(stored).toMatchObject({ conversationId: 'conv-8', answer: 'enjoy', terminationReason: 'final_message' });
	});
});
