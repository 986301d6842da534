import { test, expect, describe, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from './registry.js';
import { ToolExecutor, clipPayload, serializePayload } from './executor.js';
import { defineTool, type ExecutionScope, type ToolCall } from './types.js';

// ── Helpers ──

const scope: ExecutionScope = { conversationId: 'conv-1', iteration: 2 };

function call(name: string, args: unknown, id = `id_${name}`): ToolCall {
	return { id, name, arguments: args, source: 'text' };
}

function deferred<T>() {
	let resolve: (value: T) => void = () => undefined;
	const promise = new Promise<T>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

// ── Tests ──

describe('ToolExecutor', () => {
	let registry: ToolRegistry;
	let executor: ToolExecutor;
	const searchHandler = vi.fn(async (args: { query: string; limit: number }) => ({
		query: args.query,
		limit: args.limit,
	}));

	beforeEach(() => {
		searchHandler.mockClear();
		registry = new ToolRegistry()
			.register(
				defineTool({
					name: 'search_recipes',
					category: 'recipe_search',
					description: 'Search recipes',
					parameters: z.object({
						query: z.string(),
						limit: z.number().int().min(1).default(5),
					}),
					handler: searchHandler,
				}),
			)
			.register(
				defineTool({
					name: 'explode',
					category: 'test',
					description: 'Always fails',
					parameters: z.object({}),
					handler: () => {
						throw new Error('kitchen on fire');
					},
				}),
			)
			.register(
				defineTool({
					name: 'echo',
					category: 'test',
					description: 'Echo text',
					parameters: z.object({ text: z.string() }),
					handler: (args) => args.text,
				}),
			)
			.seal();
		executor = new ToolExecutor(registry, { maxPayloadChars: 20 });
	});

	describe('execute', () => {
		test('returns the serialized handler result', async () => {
			const result = await executor.execute(call('search_recipes', { query: 'soup' }), scope);

			expect(result.success).toBe(true);
			expect(result.success && result.payload).toBe('{"query":"soup","limit":5}'.slice(0, 20) + '\n[truncated 6 characters]');
			expect(result.metadata.truncated).toBe(true);
			expect(result.metadata.originalLength).toBe(26);
		});

		test('passes validated arguments and context to the handler', async () => {
			await executor.execute(call('search_recipes', { query: 'soup', limit: 2 }, 'c7'), scope);

			expect(searchHandler).toHaveBeenCalledWith(
				{ query: 'soup', limit: 2 },
				{ conversationId: 'conv-1', iteration: 2, callId: 'c7', signal: undefined },
			);
		});

		test('returns strings unchanged', async () => {
			const result = await executor.execute(call('echo', { text: 'hello' }), scope);

			expect(result).toMatchObject({ success: true, payload: 'hello', callId: 'id_echo', toolName: 'echo' });
			expect(result.metadata.truncated).toBe(false);
		});

		test('reports an unknown tool without throwing', async () => {
			const result = await executor.execute(call('make_coffee', {}), scope);

			expect(result).toMatchObject({ success: false, errorKind: 'UnknownTool' });
		});

		test('reports validation errors without invoking the handler', async () => {
			const result = await executor.execute(call('search_recipes', { query: 42 }), scope);

			expect(result.success).toBe(false);
			expect(!result.success && result.errorKind).toBe('ValidationError');
			expect(searchHandler).not.toHaveBeenCalled();
		});

		test('accepts JSON-encoded string arguments', async () => {
			const result = await executor.execute(call('echo', '{"text":"hi"}'), scope);

			expect(result).toMatchObject({ success: true, payload: 'hi' });
		});

		test('rejects string arguments that are not JSON', async () => {
			const result = await executor.execute(call('echo', '{text'), scope);

			expect(result).toMatchObject({ success: false, errorKind: 'ValidationError' });
		});

		test('converts a handler exception into an ExecutionError result', async () => {
			const result = await executor.execute(call('explode', {}), scope);

			expect(result).toMatchObject({
				success: false,
				errorKind: 'ExecutionError',
				message: 'kitchen on fire',
			});
		});
	});

	describe('executeAll', () => {
		test('returns results in call order regardless of completion order', async () => {
			const slow = deferred<string>();
			const fast = deferred<string>();
			const ordered = new ToolRegistry()
				.register(
					defineTool({
						name: 'slow',
						category: 'test',
						description: 'Slow tool',
						parameters: z.object({}),
						handler: () => slow.promise,
					}),
				)
				.register(
					defineTool({
						name: 'fast',
						category: 'test',
						description: 'Fast tool',
						parameters: z.object({}),
						handler: () => fast.promise,
					}),
				);
			const pending = new ToolExecutor(ordered).executeAll(
				[call('slow', {}, 'a'), call('fast', {}, 'b'), call('missing', {}, 'c')],
				scope,
			);

			fast.resolve('fast done');
			await Promise.resolve();
			slow.resolve('slow done');

			const results = await pending;
			expect(results.map((r) => r.callId)).toEqual(['a', 'b', 'c']);
			expect(results.map((r) => (r.success ? r.payload : r.errorKind))).toEqual([
				'slow done',
				'fast done',
				'UnknownTool',
			]);
		});

		test('returns one result per call even when every call fails', async () => {
			const results = await executor.executeAll(
				[call('explode', {}, 'x'), call('search_recipes', {}, 'y')],
				scope,
			);

			expect(results).toHaveLength(2);
			expect(results.every((r) => !r.success)).toBe(true);
		});
	});
});

describe('clipPayload', () => {
	test('leaves short text alone', () => {
		expect(clipPayload('abc', 5)).toEqual({ text: 'abc', truncated: false, originalLength: 3 });
	});

	test('cuts long text and notes how much was dropped', () => {
		expect(clipPayload('abcdefgh', 5)).toEqual({
			text: 'abcde\n[truncated 3 characters]',
			truncated: true,
			originalLength: 8,
		});
	});
});

describe('serializePayload', () => {
	test('JSON-encodes non-string values', () => {
		expect(serializePayload({ kcal: 420 })).toBe('{"kcal":420}');
		expect(serializePayload(undefined)).toBe('');
	});

	test('throws for values with no JSON form', () => {
		expect(() => serializePayload(() => 1)).toThrow(TypeError);
	});
});
