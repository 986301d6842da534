import { createLogger } from './logging.js';

const logger = createLogger('perf');

export interface TimingResult<T> {
	result: T;
	durationMs: number;
}

/**
 * Runs `fn` and reports how long it took.
 * Failures are rethrown after the duration is logged.
 */
export async function timed<T>(
	label: string,
	fn: () => Promise<T>,
): Promise<TimingResult<T>> {
	const start = performance.now();
	try {
		const result = await fn();
		const durationMs = performance.now() - start;
		logger.debug(`${label}: ${durationMs.toFixed(1)}ms`);
		return { result, durationMs };
	} catch (error) {
		const durationMs = performance.now() - start;
		logger.debug(`${label}: FAILED after ${durationMs.toFixed(1)}ms`);
		throw error;
	}
}

/** Elapsed time of a settled operation, whichever way it settled. */
export interface Settled<T> {
	outcome: { ok: true; value: T } | { ok: false; error: unknown };
	durationMs: number;
}

/** Like `timed`, but never rejects: a failure is returned with its duration. */
export async function settle<T>(label: string, fn: () => Promise<T>): Promise<Settled<T>> {
	const start = performance.now();
	try {
		const { result, durationMs } = await timed(label, fn);
		return { outcome: { ok: true, value: result }, durationMs };
	} catch (error) {
		return { outcome: { ok: false, error }, durationMs: performance.now() - start };
	}
}
