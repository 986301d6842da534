import { test, expect, describe, vi } from 'vitest';
import { ToolExecutor, type ToolCall, type ToolResult } from 'sous';
import { RecipeStore } from './recipe-store.js';
import { createKitchenRegistry } from './tools.js';

function call(name: string, args: Record<string, unknown>, id = 'c1'): ToolCall {
	return { id, name, arguments: args, source: 'text' };
}

const scope = { conversationId: 'conv-1', iteration: 0 };

function payloadOf(result: ToolResult): unknown {
	if (!result.success) throw new Error(`expected success, got ${result.errorKind}: ${result.message}`);
	return JSON.parse(result.payload);
}

function setup() {
	const store = RecipeStore.fromFile();
	const registry = createKitchenRegistry(store);
	return { store, registry, executor: new ToolExecutor(registry) };
}

describe('kitchen tools', () => {
	test('registers three tools in two categories', () => {
		const { registry } = setup();

		expect(registry.isSealed).toBe(true);
		expect(registry.names()).toEqual(['search_recipes', 'get_recipe_details', 'analyze_nutrition']);
		expect(registry.categories()).toEqual(['recipe_search', 'nutrition']);
	});

	test('search_recipes returns summaries', async () => {
		const { executor } = setup();
		const result = await executor.execute(call('search_recipes', { query: 'lentil' }), scope);

		expect(payloadOf(result)).toEqual([expect.objectContaining({ id: 'lentil-soup', caloriesPerServing: 290 })]);
	});

	test('search_recipes caches identical searches', async () => {
		const { store, executor } = setup();
		const search = vi.spyOn(store, 'search');

		await executor.execute(call('search_recipes', { query: 'soup' }), scope);
		await executor.execute(call('search_recipes', { query: 'soup' }), scope);
		await executor.execute(call('search_recipes', { query: 'soup', limit: 2 }), scope);

		expect(search).toHaveBeenCalledTimes(2);
	});

	test('search_recipes validates its arguments', async () => {
		const { executor } = setup();
		const result = await executor.execute(call('search_recipes', { query: 'soup', limit: 50 }), scope);

		expect(result.success).toBe(false);
		expect(!result.success && result.errorKind).toBe('ValidationError');
	});

	test('get_recipe_details returns the full recipe', async () => {
		const { executor } = setup();
		const result = await executor.execute(call('get_recipe_details', { id: 'greek-salad' }), scope);

		expect(payloadOf(result)).toMatchObject({
			id: 'greek-salad',
			steps: ['Chop the vegetables, crumble over the feta and dress with oil.'],
		});
	});

	test('get_recipe_details reports unknown recipes', async () => {
		const { executor } = setup();
		const result = await executor.execute(call('get_recipe_details', { id: 'nope' }), scope);

		expect(result).toMatchObject({ success: false, errorKind: 'ExecutionError', message: 'No recipe with id "nope"' });
	});

	test('analyze_nutrition defaults to one serving', async () => {
		const { executor } = setup();
		const result = await executor.execute(call('analyze_nutrition', { recipeId: 'chickpea-curry' }), scope);

		expect(payloadOf(result)).toMatchObject({
			servings: 1,
			total: { calories: 420, proteinG: 14, carbsG: 38, fatG: 24, fiberG: 11 },
		});
	});
});
