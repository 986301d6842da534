import { z } from 'zod';
import type { ModelCompletion, StructuredToolCall } from '../model/types.js';
import type { ToolCall } from '../model/messages.js';
import { createLogger } from '../logging.js';
import type { ParseOutcome } from './types.js';

const logger = createLogger('parser');

export const FINAL_MESSAGE_MARKER = '{{final_message:';
const MARKER_CLOSE = '}}';

const DIRECTIVE_PATTERN = /<tool_call>([\s\S]*?)<\/tool_call>/g;

const DirectiveSchema = z.object({
	id: z.string().min(1).optional(),
	name: z.string().min(1),
	arguments: z.record(z.unknown()).default({}),
});

interface RawCall {
	id?: string;
	name: string;
	arguments: unknown;
	source: ToolCall['source'];
}

/**
 * Splits model output into a terminal answer, a batch of tool calls, or
 * nothing usable.
 *
 * The marker `{{final_message:` (case-sensitive, first occurrence) wins over
 * any tool calls in the same output. Tool calls come from the provider's
 * tool-calling API and from `<tool_call>{"name": ..., "arguments": {...}}</tool_call>`
 * directives in the text, structured calls first.
 */
export class ResponseParser {
	parse(completion: Pick<ModelCompletion, 'rawText' | 'toolCalls'>, iteration = 0): ParseOutcome {
		const text = completion.rawText;
		const structured = completion.toolCalls ?? [];

		const markerAt = text.indexOf(FINAL_MESSAGE_MARKER);
		if (markerAt !== -1) {
			const before = text.slice(0, markerAt);
			const discarded = structured.length + extractDirectives(before).calls.length;
			if (discarded > 0) {
				logger.debug('Final message marker present; discarding tool calls', { discarded });
			}
			return {
				kind: 'final_message',
				reasoning: stripDirectives(before).trim(),
				finalMessage: extractPayload(text.slice(markerAt + FINAL_MESSAGE_MARKER.length)),
				discardedToolCalls: discarded,
			};
		}

		const directives = extractDirectives(text);
		const raw: RawCall[] = [
			...structured.map((call) => fromStructured(call)),
			...directives.calls,
		];

		if (directives.malformed > 0) {
			logger.warn('Ignored malformed tool-call directive(s)', { count: directives.malformed });
		}

		const reasoning = stripDirectives(text).trim();
		if (raw.length === 0) {
			return { kind: 'inconclusive', reasoning };
		}

		return { kind: 'tool_calls', reasoning, toolCalls: assignIds(raw, iteration) };
	}
}

/**
 * Payload after the marker, up to the end of the output. Whitespace right
 * after the marker and at the end of the output is dropped, then one closing
 * `}}` if it ends the output. Everything in between is kept as written.
 */
export function extractPayload(afterMarker: string): string {
	const payload = afterMarker.trimStart().trimEnd();
	return payload.endsWith(MARKER_CLOSE) ? payload.slice(0, -MARKER_CLOSE.length) : payload;
}

function fromStructured(call: StructuredToolCall): RawCall {
	return { id: call.id, name: call.name, arguments: call.arguments, source: 'structured' };
}

function extractDirectives(text: string): { calls: RawCall[]; malformed: number } {
	const calls: RawCall[] = [];
	let malformed = 0;

	for (const match of text.matchAll(DIRECTIVE_PATTERN)) {
		const parsed = DirectiveSchema.safeParse(parseJson(match[1] ?? ''));
		if (!parsed.success) {
			malformed++;
			continue;
		}
		calls.push({
			id: parsed.data.id,
			name: parsed.data.name,
			arguments: parsed.data.arguments,
			source: 'text',
		});
	}

	return { calls, malformed };
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

function stripDirectives(text: string): string {
	return text.replace(DIRECTIVE_PATTERN, '');
}

/** Keeps model-supplied ids that are unique in this output; replaces the rest. */
function assignIds(raw: readonly RawCall[], iteration: number): ToolCall[] {
	const seen = new Set<string>();
	return raw.map((call, index) => {
		let id = call.id;
		if (!id || seen.has(id)) {
			id = `call_${iteration}_${index}`;
			for (let n = 1; seen.has(id); n++) {
				id = `call_${iteration}_${index}_${n}`;
			}
		}
		seen.add(id);
		return { id, name: call.name, arguments: call.arguments, source: call.source };
	});
}
