import { test, expect, describe, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SchemaViolationError } from 'sous';
import { RecipeStore } from './recipe-store.js';

const store = RecipeStore.fromFile();

describe('RecipeStore', () => {
	let dir: string | undefined;

	afterEach(async () => {
		if (dir) await rm(dir, { recursive: true, force: true });
		dir = undefined;
	});

	test('loads the bundled recipe book', () => {
		expect(store.size).toBe(8);
		expect(store.get('lentil-soup')?.title).toBe('Red lentil soup');
		expect(store.get('missing')).toBeUndefined();
	});

	test('rejects a malformed recipe file', async () => {
		dir = await mkdtemp(join(tmpdir(), 'sous-recipes-'));
		const file = join(dir, 'recipes.json');
		await writeFile(file, JSON.stringify([{ id: '' }]));

		expect(() => RecipeStore.fromFile(file)).toThrow(SchemaViolationError);
	});

	describe('search', () => {
		test('matches ingredients and titles', () => {
			expect(store.search({ query: 'lentil' }).map((r) => r.id)).toEqual(['lentil-soup']);
		});

		test('ranks recipes matching more words first, then by title', () => {
			expect(store.search({ query: 'vegan quick' }).map((r) => r.id)).toEqual([
				'hummus-wrap',
				'chickpea-curry',
				'chicken-stir-fry',
				'greek-salad',
				'overnight-oats',
			]);
		});

		test('applies meal type, tag and prep time filters', () => {
			expect(store.search({ query: 'olive oil', mealType: 'dinner' }).map((r) => r.id)).toEqual(['salmon-traybake']);
			expect(store.search({ query: 'rice', tags: ['vegetarian'] }).map((r) => r.id)).toEqual(['mushroom-risotto']);
			expect(store.search({ query: 'rice', tags: ['vegan'] })).toEqual([]);
			expect(store.search({ query: 'olive', maxPrepMinutes: 15 }).map((r) => r.id)).toEqual(['greek-salad']);
		});

		test('returns summaries', () => {
			expect(store.search({ query: 'hummus' })).toEqual([
				{
					id: 'hummus-wrap',
					title: 'Hummus and roasted pepper wrap',
					cuisine: 'middle_eastern',
					mealType: 'snack',
					tags: ['vegetarian', 'vegan', 'quick'],
					prepMinutes: 10,
					caloriesPerServing: 330,
				},
			]);
		});

		test('honours the limit', () => {
			expect(store.search({ query: 'vegan quick', limit: 2 })).toHaveLength(2);
		});
	});

	describe('nutritionFor', () => {
		test('scales per-serving values', () => {
			expect(store.nutritionFor('chickpea-curry', 2)).toEqual({
				recipeId: 'chickpea-curry',
				title: 'Chickpea and spinach curry',
				servings: 2,
				perServing: { calories: 420, proteinG: 14, carbsG: 38, fatG: 24, fiberG: 11 },
				total: { calories: 840, proteinG: 28, carbsG: 76, fatG: 48, fiberG: 22 },
			});
		});

		test('is undefined for unknown recipes', () => {
			expect(store.nutritionFor('missing', 1)).toBeUndefined();
		});
	});
});
