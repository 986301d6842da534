import { test, expect, describe, afterEach, vi } from 'vitest';
import { backoffDelay, sleep, squashWhitespace, truncateText, withDeadline } from './utils.js';
import { ModelTimeoutError, OperationCancelledError } from './errors.js';

afterEach(() => {
	vi.useRealTimers();
});

describe('withDeadline', () => {
	test('resolves with the operation result', async () => {
		await expect(withDeadline(async () => 'ok', 1000)).resolves.toBe('ok');
	});

	test('rejects with ModelTimeoutError and aborts the operation at the deadline', async () => {
		vi.useFakeTimers();
		let seen: AbortSignal | undefined;
		const pending = withDeadline((signal) => {
			seen = signal;
			return new Promise<string>(() => undefined);
		}, 100);
		const assertion = expect(pending).rejects.toBeInstanceOf(ModelTimeoutError);

		await vi.advanceTimersByTimeAsync(100);
		await assertion;
		expect(seen?.aborted).toBe(true);
	});

	test('rejects with OperationCancelledError when the parent aborts', async () => {
		const parent = new AbortController();
		const pending = withDeadline(() => new Promise<string>(() => undefined), 10_000, parent.signal);
		parent.abort();

		await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
	});

	test('does not start when the parent is already aborted', async () => {
		const parent = new AbortController();
		parent.abort();
		const operation = vi.fn(async () => 'never');

		await expect(withDeadline(operation, 1000, parent.signal)).rejects.toBeInstanceOf(OperationCancelledError);
		expect(operation).not.toHaveBeenCalled();
	});
});

describe('sleep', () => {
	test('resolves after the delay', async () => {
		vi.useFakeTimers();
		const done = vi.fn();
		const pending = sleep(500).then(done);

		await vi.advanceTimersByTimeAsync(499);
		expect(done).not.toHaveBeenCalled();
		await vi.advanceTimersByTimeAsync(1);
		await pending;
		expect(done).toHaveBeenCalledOnce();
	});

	test('rejects when the signal aborts', async () => {
		const controller = new AbortController();
		const pending = sleep(10_000, controller.signal);
		controller.abort();

		await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
	});
});

describe('backoffDelay', () => {
	test('grows geometrically up to the cap', () => {
		expect(backoffDelay(0)).toBe(1000);
		expect(backoffDelay(2)).toBe(4000);
		expect(backoffDelay(10)).toBe(30000);
		expect(backoffDelay(1, { initialDelayMs: 10, backoffFactor: 3 })).toBe(30);
	});
});

describe('text helpers', () => {
	test('truncateText', () => {
		expect(truncateText('short', 10)).toBe('short');
		expect(truncateText('a long sentence', 9)).toBe('a long...');
	});

	test('squashWhitespace', () => {
		expect(squashWhitespace('  one\n\n two\tthree ')).toBe('one two three');
	});
});
