import type { ContextMessage, Tokenizer } from './types.js';
import { squashWhitespace, truncateText } from '../utils.js';

/**
 * Rough token estimation: ~4 characters per token.
 */
export function estimateTokens(text: string): number {
	return Math.ceil(text.length / 4);
}

export const SUMMARY_HEADER = '[Previous conversation history compressed]';

const LINE_CHARS = 200;

function describeMessage(message: ContextMessage): string {
	const text = squashWhitespace(message.content);
	switch (message.role) {
		case 'tool':
			return `- tool ${message.toolName ?? 'result'}: ${truncateText(text, LINE_CHARS)}`;
		case 'assistant': {
			const calls = message.toolCalls?.map((call) => call.name).join(', ');
			const body = calls ? `${text} (called ${calls})`.trim() : text;
			return `- assistant: ${truncateText(body, LINE_CHARS)}`;
		}
		case 'assistant_internal':
			return `- earlier summary: ${truncateText(text, LINE_CHARS)}`;
		default:
			return `- ${message.role}: ${truncateText(text, LINE_CHARS)}`;
	}
}

/**
 * Deterministic digest of `messages` that stays within `maxTokens`.
 * When not every line fits, the most recent lines win and the number of
 * omitted ones is stated.
 */
export function summarizeMessages(
	messages: readonly ContextMessage[],
	maxTokens: number,
	tokenizer: Tokenizer,
): string {
	const header = `${SUMMARY_HEADER} ${messages.length} earlier message(s):`;
	const lines = messages.map(describeMessage);

	const kept: string[] = [];
	let used = tokenizer(header);
	for (let i = lines.length - 1; i >= 0; i--) {
		const cost = tokenizer(`\n${lines[i]}`);
		if (used + cost > maxTokens) break;
		kept.unshift(lines[i]);
		used += cost;
	}

	const omitted = lines.length - kept.length;
	const omittedNote = omitted > 0 ? `- (${omitted} older message(s) omitted)` : undefined;
	if (omittedNote && used + tokenizer(`\n${omittedNote}`) <= maxTokens) {
		kept.unshift(omittedNote);
	}

	return [header, ...kept].join('\n');
}
