import type { ZodIssue } from 'zod';
import type { ToolRegistry } from './registry.js';
import type {
	ExecutionScope,
	ToolCall,
	ToolErrorKind,
	ToolFailure,
	ToolResult,
	ToolResultMetadata,
} from './types.js';
import { settle } from '../telemetry.js';
import { createLogger, errorMessage } from '../logging.js';

const logger = createLogger('tools');

export interface ToolExecutorOptions {
	/** Serialized payloads longer than this are cut. */
	maxPayloadChars?: number;
}

const DEFAULT_MAX_PAYLOAD_CHARS = 4000;

interface Clipped {
	text: string;
	truncated: boolean;
	originalLength: number;
}

export function clipPayload(text: string, maxChars: number): Clipped {
	if (text.length <= maxChars) {
		return { text, truncated: false, originalLength: text.length };
	}
	const dropped = text.length - maxChars;
	return {
		text: `${text.slice(0, maxChars)}\n[truncated ${dropped} characters]`,
		truncated: true,
		originalLength: text.length,
	};
}

/** Strings pass through; anything else is JSON-encoded. */
export function serializePayload(value: unknown): string {
	if (typeof value === 'string') return value;
	if (value === undefined) return '';
	const encoded: unknown = JSON.stringify(value);
	if (typeof encoded !== 'string') {
		throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
	}
	return encoded;
}

export function formatIssues(issues: readonly ZodIssue[]): string {
	return issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
		.join('; ');
}

function decodeArguments(raw: unknown): { ok: true; value: unknown } | { ok: false; message: string } {
	if (typeof raw !== 'string') return { ok: true, value: raw ?? {} };
	if (raw.trim() === '') return { ok: true, value: {} };
	try {
		return { ok: true, value: JSON.parse(raw) };
	} catch (error) {
		return { ok: false, message: `arguments are not valid JSON: ${errorMessage(error)}` };
	}
}

/**
 * Validates and runs tool calls. `execute` never rejects: every outcome,
 * including unknown tools and handler failures, becomes a ToolResult.
 */
export class ToolExecutor {
	private readonly maxPayloadChars: number;

	constructor(
		private readonly registry: ToolRegistry,
		options: ToolExecutorOptions = {},
	) {
		this.maxPayloadChars = options.maxPayloadChars ?? DEFAULT_MAX_PAYLOAD_CHARS;
	}

	async execute(call: ToolCall, scope: ExecutionScope): Promise<ToolResult> {
		if (!this.registry.has(call.name)) {
			logger.warn('Model requested an unknown tool', { tool: call.name, call: call.id });
			return this.failure(call, 'UnknownTool', `No tool named "${call.name}" is available`, 0);
		}

		const tool = this.registry.get(call.name);
		const decoded = decodeArguments(call.arguments);
		if (!decoded.ok) {
			return this.failure(call, 'ValidationError', decoded.message, 0);
		}

		const parsed = tool.parameters.safeParse(decoded.value);
		if (!parsed.success) {
			const message = `Invalid arguments for ${call.name}: ${formatIssues(parsed.error.issues)}`;
			logger.debug(message, { call: call.id });
			return this.failure(call, 'ValidationError', message, 0);
		}

		const { outcome, durationMs } = await settle(`tool ${call.name}`, async () =>
			serializePayload(
				await tool.handler(parsed.data, {
					conversationId: scope.conversationId,
					iteration: scope.iteration,
					callId: call.id,
					signal: scope.signal,
				}),
			),
		);

		if (!outcome.ok) {
			const message = errorMessage(outcome.error);
			logger.warn(`Tool ${call.name} failed: ${message}`, { call: call.id });
			return this.failure(call, 'ExecutionError', message, durationMs);
		}

		const clipped = clipPayload(outcome.value, this.maxPayloadChars);
		return {
			callId: call.id,
			toolName: call.name,
			success: true,
			payload: clipped.text,
			metadata: metadataOf(clipped, durationMs),
		};
	}

	/**
	 * Runs one iteration's calls concurrently. Results come back in the
	 * order of `calls`, whatever order the handlers finish in.
	 */
	executeAll(calls: readonly ToolCall[], scope: ExecutionScope): Promise<ToolResult[]> {
		return Promise.all(calls.map((call) => this.execute(call, scope)));
	}

	private failure(
		call: ToolCall,
		errorKind: ToolErrorKind,
		message: string,
		durationMs: number,
	): ToolFailure {
		const clipped = clipPayload(message, this.maxPayloadChars);
		return {
			callId: call.id,
			toolName: call.name,
			success: false,
			errorKind,
			message: clipped.text,
			metadata: metadataOf(clipped, durationMs),
		};
	}
}

function metadataOf(clipped: Clipped, durationMs: number): ToolResultMetadata {
	return {
		durationMs,
		truncated: clipped.truncated,
		originalLength: clipped.originalLength,
	};
}
