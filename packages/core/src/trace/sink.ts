import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Trace, TraceSink } from './types.js';

/**
 * JSON-compatible form of a trace, timestamps as ISO strings.
 */
export function serializeTrace(trace: Trace, answer: string): Record<string, unknown> {
	return {
		conversationId: trace.conversationId,
		answer,
		terminationReason: trace.terminationReason,
		error: trace.error,
		startedAt: new Date(trace.startedAt).toISOString(),
		endedAt: new Date(trace.endedAt).toISOString(),
		totalDurationMs: trace.totalDurationMs,
		totalCost: trace.totalCost,
		totalToolCalls: trace.totalToolCalls,
		usage: trace.usage,
		iterations: trace.iterations.map((iteration) => ({
			...iteration,
			startedAt: new Date(iteration.startedAt).toISOString(),
		})),
		transitions: trace.transitions.map((transition) => ({
			...transition,
			at: new Date(transition.at).toISOString(),
		})),
	};
}

/** Keeps traces in memory; for tests and embedding. */
export class MemoryTraceSink implements TraceSink {
	readonly entries: Array<{ trace: Trace; answer: string }> = [];

	async write(trace: Trace, answer: string): Promise<void> {
		this.entries.push({ trace, answer });
	}

	get last(): { trace: Trace; answer: string } | undefined {
		return this.entries[this.entries.length - 1];
	}
}

/** Writes each trace to `<dir>/<conversationId>-<startedAt>.json`. */
export class JsonFileTraceSink implements TraceSink {
	constructor(readonly dir: string) {}

	pathFor(trace: Trace): string {
		return join(this.dir, `${trace.conversationId}-${trace.startedAt}.json`);
	}

	async write(trace: Trace, answer: string): Promise<void> {
		await mkdir(this.dir, { recursive: true });
		const json = JSON.stringify(serializeTrace(trace, answer), null, 2);
		await writeFile(this.pathFor(trace), json, 'utf-8');
	}
}
