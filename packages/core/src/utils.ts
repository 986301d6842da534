import { nanoid } from 'nanoid';
import { ModelTimeoutError, OperationCancelledError } from './errors.js';

// ── ID generation ──

export function generateId(size = 12): string {
	return nanoid(size);
}

// ── Text utilities ──

export function truncateText(text: string, maxLength: number, suffix = '...'): string {
	if (text.length <= maxLength) return text;
	return text.slice(0, maxLength - suffix.length) + suffix;
}

/** Collapses whitespace runs so a message fits on one line of a summary. */
export function squashWhitespace(text: string): string {
	return text.replace(/\s+/g, ' ').trim();
}

// ── Timing ──

/** Resolves after `ms`, or rejects with OperationCancelledError once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new OperationCancelledError());
			return;
		}
		const onAbort = (): void => {
			clearTimeout(handle);
			reject(new OperationCancelledError());
		};
		const handle = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Runs `operation` with a deadline. The operation receives a signal that is
 * aborted when the deadline passes (or when `parent` aborts), so the
 * underlying request is cancelled instead of left running.
 */
export async function withDeadline<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	ms: number,
	parent?: AbortSignal,
): Promise<T> {
	if (parent?.aborted) throw new OperationCancelledError();
	const controller = new AbortController();
	const unlink = linkSignal(parent, controller);

	let handle: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		handle = setTimeout(() => {
			const error = new ModelTimeoutError(ms);
			reject(error);
			controller.abort(error);
		}, ms);
	});
	const cancelled = new Promise<never>((_, reject) => {
		controller.signal.addEventListener(
			'abort',
			() => {
				if (parent?.aborted) reject(new OperationCancelledError());
			},
			{ once: true },
		);
	});
	// Losing racers must not surface as unhandled rejections.
	deadline.catch(() => undefined);
	cancelled.catch(() => undefined);

	try {
		return await Promise.race([operation(controller.signal), deadline, cancelled]);
	} finally {
		clearTimeout(handle);
		unlink();
	}
}

/** Forwards an abort from `parent` to `child`; returns a function that detaches the link. */
export function linkSignal(parent: AbortSignal | undefined, child: AbortController): () => void {
	if (!parent) return () => undefined;
	if (parent.aborted) {
		child.abort(parent.reason);
		return () => undefined;
	}
	const forward = (): void => child.abort(parent.reason);
	parent.addEventListener('abort', forward, { once: true });
	return () => parent.removeEventListener('abort', forward);
}

// ── Backoff ──

export interface BackoffOptions {
	initialDelayMs: number;
	maxDelayMs: number;
	backoffFactor: number;
}

const DEFAULT_BACKOFF: BackoffOptions = {
	initialDelayMs: 1000,
	maxDelayMs: 30000,
	backoffFactor: 2,
};

/** Delay before retry number `attempt` (0-based). */
export function backoffDelay(attempt: number, options: Partial<BackoffOptions> = {}): number {
	const opts = { ...DEFAULT_BACKOFF, ...options };
	return Math.min(opts.initialDelayMs * opts.backoffFactor ** attempt, opts.maxDelayMs);
}
