import { assistantMessage, userMessage, type ChatMessage, type RunResult } from 'sous';

/**
 * Short-lived history for the chat command. Only answered turns are kept,
 * and only the most recent `maxTurns` of them.
 */
export class ChatSession {
	private turns: Array<[ChatMessage, ChatMessage]> = [];

	constructor(readonly maxTurns = 5) {}

	get history(): ChatMessage[] {
		return this.turns.flat();
	}

	get turnCount(): number {
		return this.turns.length;
	}

	record(message: string, result: Pick<RunResult, 'answer' | 'terminationReason'>): void {
		if (result.terminationReason !== 'final_message') return;
		this.turns.push([userMessage(message), assistantMessage(result.answer)]);
		if (this.turns.length > this.maxTurns) {
			this.turns = this.turns.slice(-this.maxTurns);
		}
	}

	reset(): void {
		this.turns = [];
	}
}

export type SlashCommand = 'help' | 'reset' | 'quit' | 'unknown';

/** Recognizes `/help`, `/reset` and `/quit`; undefined for ordinary messages. */
export function parseSlashCommand(line: string): SlashCommand | undefined {
	const trimmed = line.trim();
	if (!trimmed.startsWith('/')) return undefined;
	switch (trimmed.slice(1).toLowerCase()) {
		case 'help':
		case '?':
			return 'help';
		case 'reset':
		case 'clear':
			return 'reset';
		case 'quit':
		case 'exit':
		case 'q':
			return 'quit';
		default:
			return 'unknown';
	}
}
