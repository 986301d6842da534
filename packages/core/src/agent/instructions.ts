import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ToolRegistry } from '../tools/registry.js';
import type { ToolResult } from '../tools/types.js';
import type { BudgetExceededReason } from '../metering/types.js';
import { FINAL_MESSAGE_MARKER } from '../parser/response-parser.js';

// ── Template loading ──

const TEMPLATES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), 'instructions');

const templateCache = new Map<string, string>();

function loadTemplate(filename: string): string {
	const cached = templateCache.get(filename);
	if (cached !== undefined) return cached;

	const filepath = resolve(TEMPLATES_DIR, filename);
	try {
		const content = readFileSync(filepath, 'utf-8');
		templateCache.set(filename, content);
		return content;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to load system prompt template "${filename}": ${message}`);
	}
}

/**
 * Interpolate `{{key}}` placeholders. Unknown keys, and anything that is not
 * a bare word in braces (such as the final-message marker), are left as-is.
 */
export function interpolate(template: string, variables: Record<string, string>): string {
	return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => variables[key] ?? match);
}

// ── InstructionBuilder ──

export interface InstructionBuilderOptions {
	assistantName?: string;
	/** Replaces the template entirely. */
	overrideInstructions?: string;
	/** Appended after the template. */
	extendInstructions?: string;
}

/**
 * Builds the pinned system prompt from `instructions/instructions.md` and
 * the registry's tool list.
 */
export class InstructionBuilder {
	constructor(
		private readonly registry: ToolRegistry,
		private readonly options: InstructionBuilderOptions = {},
	) {}

	build(userContext?: string): string {
		let prompt =
			this.options.overrideInstructions ??
			interpolate(loadTemplate('instructions.md'), {
				assistantName: this.options.assistantName ?? 'Sous',
				toolDescriptions: this.registry.size > 0 ? this.registry.describe() : '(no tools available)',
			});

		if (this.options.extendInstructions) {
			prompt += `\n\n${this.options.extendInstructions}`;
		}
		if (userContext) {
			prompt += `\n\n## About the user\n\n${userContext}`;
		}
		return prompt;
	}

	// ── Static prompt fragment builders ──

	static correctiveNote(consecutive: number, limit: number): string {
		return (
			`Your last reply contained neither a tool call nor a final answer (${consecutive}/${limit}). ` +
			`Call a tool, or answer the user with ${FINAL_MESSAGE_MARKER} ...}}.`
		);
	}

	static fallbackAnswer(reason: BudgetExceededReason, results: readonly ToolResult[]): string {
		const limit =
			reason === 'iteration_limit'
				? 'the maximum number of steps'
				: reason === 'time_limit'
					? 'the time limit'
					: 'the cost limit';

		const used = [...new Set(results.filter((r) => r.success).map((r) => r.toolName))];
		const progress =
			used.length > 0
				? ` I did look into this using ${used.join(', ')}, but could not put together a complete answer in time.`
				: '';

		return `I'm sorry, I reached ${limit} while working on your request.${progress} Please try again, perhaps with a narrower question.`;
	}

	static readonly APOLOGY =
		"I'm sorry, something went wrong while preparing your answer. Please try again in a moment.";
}
