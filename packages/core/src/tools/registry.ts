import { z } from 'zod';
import type { ToolSchema } from '../model/types.js';
import { zodToJsonSchema } from '../model/schema.js';
import {
	DuplicateToolError,
	RegistrySealedError,
	SchemaViolationError,
	ToolDefinitionError,
	UnknownToolError,
} from '../errors.js';
import type { RegisteredTool, ToolCatalog, ToolDefinition } from './types.js';

const TOOL_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]{0,63}$/;

/** Returns every problem with a definition; empty when it is usable. */
export function inspectDefinition(definition: ToolDefinition): string[] {
	const issues: string[] = [];
	if (!TOOL_NAME_PATTERN.test(definition.name)) {
		issues.push('name must start with a letter and contain only letters, digits, "_" or "-" (max 64)');
	}
	if (!definition.category.trim()) {
		issues.push('category must not be empty');
	}
	if (!definition.description.trim()) {
		issues.push('description must not be empty');
	}
	if (!(definition.parameters instanceof z.ZodObject)) {
		issues.push('parameters must be a zod object schema');
	}
	if (typeof definition.handler !== 'function') {
		issues.push('handler must be a function');
	}
	return issues;
}

/**
 * Name-keyed tool catalog. Mutable until sealed; read-only (and safe to
 * share across conversations) afterwards.
 */
export class ToolRegistry {
	private readonly tools = new Map<string, RegisteredTool>();
	private sealed = false;

	/**
	 * Builds a sealed registry from a catalog keyed by tool name.
	 * Every entry is checked before any is registered; all problems are
	 * reported together.
	 */
	static fromCatalog<K extends string>(catalog: ToolCatalog<K>): ToolRegistry {
		const entries = Object.entries<ToolDefinition>(catalog);
		const issues: string[] = [];

		for (const [key, definition] of entries) {
			if (key !== definition.name) {
				issues.push(`${key}: catalog key does not match tool name "${definition.name}"`);
			}
			for (const issue of inspectDefinition(definition)) {
				issues.push(`${key}: ${issue}`);
			}
		}

		if (issues.length > 0) {
			throw new SchemaViolationError('tool catalog', issues);
		}

		const registry = new ToolRegistry();
		for (const [, definition] of entries) {
			registry.register(definition);
		}
		return registry.seal();
	}

	register(definition: ToolDefinition): this {
		if (this.sealed) {
			throw new RegistrySealedError(definition.name);
		}
		if (this.tools.has(definition.name)) {
			throw new DuplicateToolError(definition.name);
		}
		const issues = inspectDefinition(definition);
		if (issues.length > 0) {
			throw new ToolDefinitionError(definition.name, issues.join('; '));
		}

		const registered: RegisteredTool = Object.freeze({
			name: definition.name,
			category: definition.category,
			description: definition.description.trim(),
			parameters: definition.parameters,
			handler: definition.handler,
			jsonSchema: zodToJsonSchema(definition.parameters),
		});
		this.tools.set(definition.name, registered);
		return this;
	}

	/** Freezes the catalog. Idempotent. */
	seal(): this {
		this.sealed = true;
		return this;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	get(name: string): RegisteredTool {
		const tool = this.tools.get(name);
		if (!tool) {
			throw new UnknownToolError(name);
		}
		return tool;
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	names(): string[] {
		return [...this.tools.keys()];
	}

	get size(): number {
		return this.tools.size;
	}

	/** Distinct categories in first-registration order. */
	categories(): string[] {
		return [...new Set([...this.tools.values()].map((tool) => tool.category))];
	}

	/**
	 * Tool schemas in registration order, optionally limited to one or more
	 * categories.
	 */
	exportSchema(categoryFilter?: string | readonly string[]): ToolSchema[] {
		const allowed =
			categoryFilter === undefined
				? undefined
				: new Set(typeof categoryFilter === 'string' ? [categoryFilter] : categoryFilter);

		const schemas: ToolSchema[] = [];
		for (const tool of this.tools.values()) {
			if (allowed && !allowed.has(tool.category)) continue;
			schemas.push({
				name: tool.name,
				description: tool.description,
				category: tool.category,
				parameters: tool.jsonSchema,
			});
		}
		return schemas;
	}

	/** Plain-text catalog for system prompts, grouped by category. */
	describe(categoryFilter?: string | readonly string[]): string {
		const byCategory = new Map<string, string[]>();
		for (const schema of this.exportSchema(categoryFilter)) {
			const lines = byCategory.get(schema.category) ?? [];
			const params = Object.entries(schema.parameters.properties ?? {})
				.map(([key, value]) => {
					const type = typeof value === 'object' && value.type ? String(value.type) : 'any';
					const optional = schema.parameters.required?.includes(key) ? '' : '?';
					return `${key}${optional}: ${type}`;
				})
				.join(', ');
			lines.push(`- ${schema.name}(${params}): ${schema.description}`);
			byCategory.set(schema.category, lines);
		}

		return [...byCategory.entries()]
			.map(([category, lines]) => [`[${category}]`, ...lines].join('\n'))
			.join('\n\n');
	}
}
