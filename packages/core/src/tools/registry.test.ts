import { test, expect, describe, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from './registry.js';
import { defineTool, type ToolDefinition } from './types.js';
import {
	DuplicateToolError,
	RegistrySealedError,
	SchemaViolationError,
	ToolDefinitionError,
	UnknownToolError,
} from '../errors.js';

// ── Helpers ──

function makeTool(name: string, category = 'recipe_search'): ToolDefinition {
	return defineTool({
		name,
		category,
		description: `Tool ${name}`,
		parameters: z.object({ query: z.string() }),
		handler: vi.fn(async () => 'ok'),
	});
}

// ── Tests ──

describe('ToolRegistry', () => {
	let registry: ToolRegistry;

	beforeEach(() => {
		registry = new ToolRegistry();
	});

	describe('register', () => {
		test('registers a tool', () => {
			registry.register(makeTool('search_recipes'));

			expect(registry.has('search_recipes')).toBe(true);
			expect(registry.size).toBe(1);
			expect(registry.get('search_recipes').name).toBe('search_recipes');
		});

		test('rejects a duplicate name', () => {
			registry.register(makeTool('search_recipes'));

			expect(() => registry.register(makeTool('search_recipes'))).toThrow(DuplicateToolError);
		});

		test('rejects registration after sealing', () => {
			registry.register(makeTool('a_tool')).seal();

			expect(registry.isSealed).toBe(true);
			expect(() => registry.register(makeTool('b_tool'))).toThrow(RegistrySealedError);
		});

		test('rejects an invalid name', () => {
			expect(() => registry.register(makeTool('bad name!'))).toThrow(ToolDefinitionError);
		});

		test('rejects an empty description', () => {
			const tool = { ...makeTool('blank'), description: '   ' };
			expect(() => registry.register(tool)).toThrow(/description must not be empty/);
		});

		test('registered definitions are frozen', () => {
			registry.register(makeTool('frozen_tool'));
			expect(Object.isFrozen(registry.get('frozen_tool'))).toBe(true);
		});
	});

	describe('get', () => {
		test('throws UnknownToolError for a missing tool', () => {
			expect(() => registry.get('nope')).toThrow(UnknownToolError);
		});
	});

	describe('exportSchema', () => {
		beforeEach(() => {
			registry
				.register(makeTool('search_recipes', 'recipe_search'))
				.register(makeTool('analyze_nutrition', 'nutrition'))
				.register(makeTool('get_recipe_details', 'recipe_search'));
		});

		test('lists tools in registration order', () => {
			expect(registry.exportSchema().map((s) => s.name)).toEqual([
				'search_recipes',
				'analyze_nutrition',
				'get_recipe_details',
			]);
		});

		test('filters by a single category', () => {
			expect(registry.exportSchema('recipe_search').map((s) => s.name)).toEqual([
				'search_recipes',
				'get_recipe_details',
			]);
		});

		test('filters by several categories', () => {
			expect(registry.exportSchema(['nutrition']).map((s) => s.name)).toEqual(['analyze_nutrition']);
		});

		test('includes the JSON schema of the parameters', () => {
			const [schema] = registry.exportSchema();
			expect(schema).toEqual({
				name: 'search_recipes',
				description: 'Tool search_recipes',
				category: 'recipe_search',
				parameters: {
					type: 'object',
					properties: { query: { type: 'string' } },
					additionalProperties: false,
					required: ['query'],
				},
			});
		});

		test('categories keep first-registration order', () => {
			expect(registry.categories()).toEqual(['recipe_search', 'nutrition']);
		});
	});

	describe('describe', () => {
		test('groups tools by category with their parameters', () => {
			registry
				.register(makeTool('search_recipes', 'recipe_search'))
				.register(makeTool('analyze_nutrition', 'nutrition'));

			expect(registry.describe()).toBe(
				'[recipe_search]\n- search_recipes(query: string): Tool search_recipes\n\n' +
					'[nutrition]\n- analyze_nutrition(query: string): Tool analyze_nutrition',
			);
		});
	});

	describe('fromCatalog', () => {
		test('builds a sealed registry', () => {
			const catalog = {
				search_recipes: makeToolNamed('search_recipes'),
				analyze_nutrition: makeToolNamed('analyze_nutrition'),
			};
			const built = ToolRegistry.fromCatalog(catalog);

			expect(built.isSealed).toBe(true);
			expect(built.names()).toEqual(['search_recipes', 'analyze_nutrition']);
		});

		test('reports every invalid entry at once', () => {
			const broken = {
				first: { ...makeToolNamed('first'), description: '' },
				second: { ...makeToolNamed('second'), category: '' },
			};

			let caught: unknown;
			try {
				ToolRegistry.fromCatalog(broken);
			} catch (error) {
				caught = error;
			}

			expect(caught).toBeInstanceOf(SchemaViolationError);
			expect(caught instanceof SchemaViolationError && caught.issues).toEqual([
				'first: description must not be empty',
				'second: category must not be empty',
			]);
		});
	});
});

function makeToolNamed<N extends string>(name: N): ToolDefinition<z.AnyZodObject, N> {
	return defineTool({
		name,
		category: 'recipe_search',
		description: `Tool ${name}`,
		parameters: z.object({ query: z.string() }),
		handler: async () => 'ok',
	});
}
