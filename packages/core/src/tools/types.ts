import type { z } from 'zod';
import type { JSONSchema7 } from 'json-schema';
import type { Awaitable } from '../types.js';

export type { ToolCall, ToolCallSource } from '../model/messages.js';

/** Passed to every handler invocation. */
export interface ToolContext {
	conversationId: string;
	iteration: number;
	callId: string;
	/** Aborted when the run is cancelled. */
	signal?: AbortSignal;
}

export interface ToolDefinition<
	S extends z.AnyZodObject = z.AnyZodObject,
	N extends string = string,
> {
	name: N;
	/** Free-form grouping label, e.g. "recipe_search" or "nutrition". */
	category: string;
	description: string;
	parameters: S;
	handler(args: z.output<S>, context: ToolContext): Awaitable<unknown>;
}

/** Tagged catalog: every key is the name of the tool stored under it. */
export type ToolCatalog<K extends string = string> = {
	[N in K]: ToolDefinition<z.AnyZodObject, N>;
};

/** Identity helper that infers the handler's argument type from the schema. */
export function defineTool<S extends z.AnyZodObject, N extends string>(
	definition: ToolDefinition<S, N>,
): ToolDefinition<S, N> {
	return definition;
}

export interface RegisteredTool extends ToolDefinition {
	readonly jsonSchema: JSONSchema7;
}

// ── Results ──

export type ToolErrorKind = 'UnknownTool' | 'ValidationError' | 'ExecutionError';

export interface ToolResultMetadata {
	durationMs: number;
	/** Whether the payload (or error message) was cut to the size limit. */
	truncated: boolean;
	/** Length in characters before truncation. */
	originalLength: number;
}

export interface ToolSuccess {
	callId: string;
	toolName: string;
	success: true;
	payload: string;
	metadata: ToolResultMetadata;
}

export interface ToolFailure {
	callId: string;
	toolName: string;
	success: false;
	errorKind: ToolErrorKind;
	message: string;
	metadata: ToolResultMetadata;
}

export type ToolResult = ToolSuccess | ToolFailure;

/** Text the model sees for a result. */
export function renderToolResult(result: ToolResult): string {
	return result.success ? result.payload : `Error (${result.errorKind}): ${result.message}`;
}

export interface ExecutionScope {
	conversationId: string;
	iteration: number;
	signal?: AbortSignal;
}
