import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SchemaViolationError } from 'sous';

export const MEAL_TYPES = ['breakfast', 'lunch', 'dinner', 'snack'] as const;
export const DIET_TAGS = ['vegetarian', 'vegan', 'gluten_free', 'quick'] as const;

const NutritionSchema = z.object({
	calories: z.number().nonnegative(),
	proteinG: z.number().nonnegative(),
	carbsG: z.number().nonnegative(),
	fatG: z.number().nonnegative(),
	fiberG: z.number().nonnegative(),
});

const RecipeSchema = z.object({
	id: z.string().min(1),
	title: z.string().min(1),
	cuisine: z.string().min(1),
	mealType: z.enum(MEAL_TYPES),
	tags: z.array(z.enum(DIET_TAGS)),
	prepMinutes: z.number().int().positive(),
	servings: z.number().int().positive(),
	ingredients: z.array(
		z.object({
			name: z.string().min(1),
			quantity: z.number().positive(),
			unit: z.string().min(1),
		}),
	),
	steps: z.array(z.string().min(1)),
	/** Per serving. */
	nutrition: NutritionSchema,
});

export type Nutrition = z.infer<typeof NutritionSchema>;
export type Recipe = z.infer<typeof RecipeSchema>;
export type MealType = (typeof MEAL_TYPES)[number];
export type DietTag = (typeof DIET_TAGS)[number];

export interface RecipeQuery {
	query: string;
	tags?: readonly DietTag[];
	mealType?: MealType;
	maxPrepMinutes?: number;
	limit?: number;
}

export interface RecipeSummary {
	id: string;
	title: string;
	cuisine: string;
	mealType: MealType;
	tags: DietTag[];
	prepMinutes: number;
	caloriesPerServing: number;
}

export interface NutritionReport {
	recipeId: string;
	title: string;
	servings: number;
	perServing: Nutrition;
	total: Nutrition;
}

const DEFAULT_RECIPES_PATH = resolve(dirname(fileURLToPath(import.meta.url)), 'data', 'recipes.json');

/**
 * In-memory recipe book. Search matches query words against title, cuisine,
 * ingredients and tags; recipes matching more words rank first.
 */
export class RecipeStore {
	private readonly recipes = new Map<string, Recipe>();

	constructor(recipes: readonly Recipe[]) {
		for (const recipe of recipes) {
			this.recipes.set(recipe.id, recipe);
		}
	}

	static fromFile(filePath = DEFAULT_RECIPES_PATH): RecipeStore {
		const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
		const parsed = z.array(RecipeSchema).safeParse(raw);
		if (!parsed.success) {
			throw new SchemaViolationError(
				filePath,
				parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
			);
		}
		return new RecipeStore(parsed.data);
	}

	get size(): number {
		return this.recipes.size;
	}

	get(id: string): Recipe | undefined {
		return this.recipes.get(id);
	}

	search(query: RecipeQuery): RecipeSummary[] {
		const terms = query.query.toLowerCase().split(/\s+/).filter(Boolean);
		const requiredTags = query.tags ?? [];

		const ranked: Array<{ recipe: Recipe; score: number }> = [];
		for (const recipe of this.recipes.values()) {
			if (query.mealType && recipe.mealType !== query.mealType) continue;
			if (query.maxPrepMinutes !== undefined && recipe.prepMinutes > query.maxPrepMinutes) continue;
			if (!requiredTags.every((tag) => recipe.tags.includes(tag))) continue;

			const haystack = searchableText(recipe);
			const score = terms.filter((term) => haystack.includes(term)).length;
			if (terms.length > 0 && score === 0) continue;
			ranked.push({ recipe, score });
		}

		ranked.sort((a, b) => b.score - a.score || a.recipe.title.localeCompare(b.recipe.title));
		return ranked.slice(0, query.limit ?? 5).map(({ recipe }) => summarize(recipe));
	}

	/** Nutrition for `servings` portions; undefined for unknown recipes. */
	nutritionFor(recipeId: string, servings: number): NutritionReport | undefined {
		const recipe = this.recipes.get(recipeId);
		if (!recipe) return undefined;
		const per = recipe.nutrition;
		return {
			recipeId,
			title: recipe.title,
			servings,
			perServing: per,
			total: {
				calories: round(per.calories * servings),
				proteinG: round(per.proteinG * servings),
				carbsG: round(per.carbsG * servings),
				fatG: round(per.fatG * servings),
				fiberG: round(per.fiberG * servings),
			},
		};
	}
}

function searchableText(recipe: Recipe): string {
	return [
		recipe.title,
		recipe.cuisine.replace(/_/g, ' '),
		...recipe.ingredients.map((ingredient) => ingredient.name),
		...recipe.tags.map((tag) => tag.replace(/_/g, ' ')),
	]
		.join(' ')
		.toLowerCase();
}

function summarize(recipe: Recipe): RecipeSummary {
	return {
		id: recipe.id,
		title: recipe.title,
		cuisine: recipe.cuisine,
		mealType: recipe.mealType,
		tags: [...recipe.tags],
		prepMinutes: recipe.prepMinutes,
		caloriesPerServing: recipe.nutrition.calories,
	};
}

function round(value: number): number {
	return Math.round(value * 10) / 10;
}
