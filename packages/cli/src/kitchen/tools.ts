import { z } from 'zod';
import { AsyncCache, ToolRegistry, defineTool, type ToolCatalog } from 'sous';
import { DIET_TAGS, MEAL_TYPES, RecipeStore, type RecipeSummary } from './recipe-store.js';

export type KitchenToolName = 'search_recipes' | 'get_recipe_details' | 'analyze_nutrition';

export interface KitchenToolOptions {
	/** Search results are cached per argument set for this long. */
	searchTtlMs?: number;
	searchCache?: AsyncCache<string, RecipeSummary[]>;
}

const SearchParameters = z.object({
	query: z.string().min(1).describe('Words to look for in titles, cuisines and ingredients'),
	tags: z.array(z.enum(DIET_TAGS)).optional().describe('Every recipe returned carries all of these tags'),
	mealType: z.enum(MEAL_TYPES).optional(),
	maxPrepMinutes: z.number().int().positive().optional(),
	limit: z.number().int().min(1).max(10).default(5),
});

export function createKitchenCatalog(
	store: RecipeStore,
	options: KitchenToolOptions = {},
): ToolCatalog<KitchenToolName> {
	const cache =
		options.searchCache ?? new AsyncCache<string, RecipeSummary[]>({ ttlMs: options.searchTtlMs ?? 5 * 60_000 });

	return {
		search_recipes: defineTool({
			name: 'search_recipes',
			category: 'recipe_search',
			description: 'Search the recipe book. Returns short summaries; use get_recipe_details for the full recipe.',
			parameters: SearchParameters,
			handler: (args) => cache.getOrCompute(JSON.stringify(args), async () => store.search(args)),
		}),

		get_recipe_details: defineTool({
			name: 'get_recipe_details',
			category: 'recipe_search',
			description: 'Full recipe with ingredients and steps.',
			parameters: z.object({ id: z.string().min(1).describe('Recipe id from search_recipes') }),
			handler: ({ id }) => {
				const recipe = store.get(id);
				if (!recipe) throw new Error(`No recipe with id "${id}"`);
				return recipe;
			},
		}),

		analyze_nutrition: defineTool({
			name: 'analyze_nutrition',
			category: 'nutrition',
			description: 'Calories and macronutrients for a number of servings of one recipe.',
			parameters: z.object({
				recipeId: z.string().min(1),
				servings: z.number().int().min(1).max(20).default(1),
			}),
			handler: ({ recipeId, servings }) => {
				const report = store.nutritionFor(recipeId, servings);
				if (!report) throw new Error(`No recipe with id "${recipeId}"`);
				return report;
			},
		}),
	};
}

/** Sealed registry over the bundled recipe book. */
export function createKitchenRegistry(store = RecipeStore.fromFile(), options?: KitchenToolOptions): ToolRegistry {
	return ToolRegistry.fromCatalog(createKitchenCatalog(store, options));
}
