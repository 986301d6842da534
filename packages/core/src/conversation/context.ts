import type { ChatMessage, MessageRole } from '../model/messages.js';
import { summaryMessage } from '../model/messages.js';
import { ContextOverflowError, InvalidMessageError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { Clock } from '../types.js';
import type {
	CompressionReport,
	ContextMessage,
	ConversationContextOptions,
	ConversationExport,
	TokenUsage,
	Tokenizer,
} from './types.js';
import { estimateTokens, summarizeMessages } from './utils.js';

const logger = createLogger('context');

const ROLES: ReadonlySet<MessageRole> = new Set(['system', 'user', 'assistant', 'assistant_internal', 'tool']);

/**
 * Ordered message history for one conversation, bounded by a token budget.
 *
 * `tokenTotal` always equals the sum of the messages' `tokenCount`. The
 * first message, when it is a system message, is pinned and survives
 * compression.
 */
export class ConversationContext {
	readonly maxTokens: number;
	private readonly compressionThreshold: number;
	private readonly keepRecent: number;
	private readonly summaryShare: number;
	private readonly tokenizer: Tokenizer;
	private readonly clock: Clock;

	private messages: ContextMessage[] = [];
	private total = 0;
	private compressions = 0;

	constructor(options: ConversationContextOptions) {
		if (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0) {
			throw new RangeError(`maxTokens must be a positive integer, got ${options.maxTokens}`);
		}
		this.maxTokens = options.maxTokens;
		this.compressionThreshold = options.compressionThreshold ?? 0.85;
		this.keepRecent = options.keepRecent ?? 6;
		this.summaryShare = options.summaryShare ?? 0.15;
		this.tokenizer = options.tokenizer ?? estimateTokens;
		this.clock = options.clock ?? Date.now;
	}

	get tokenTotal(): number {
		return this.total;
	}

	get length(): number {
		return this.messages.length;
	}

	get compressionCount(): number {
		return this.compressions;
	}

	/** Stamps a message with its token count and timestamp, without appending it. */
	createMessage(message: ChatMessage): ContextMessage {
		const structuredCalls = message.toolCalls?.filter((call) => call.source === 'structured') ?? [];
		const callTokens =
			structuredCalls.length > 0
				? this.tokenizer(JSON.stringify(structuredCalls.map(({ name, arguments: args }) => ({ name, args }))))
				: 0;
		return {
			...message,
			tokenCount: this.tokenizer(message.content) + callTokens,
			timestamp: this.clock(),
		};
	}

	/** Appends a message that already carries its token count. */
	append(message: ContextMessage): ContextMessage {
		if (!ROLES.has(message.role)) {
			throw new InvalidMessageError(`Unknown message role "${String(message.role)}"`);
		}
		if (typeof message.content !== 'string') {
			throw new InvalidMessageError('Message content must be a string');
		}
		if (!Number.isInteger(message.tokenCount) || message.tokenCount < 0) {
			throw new InvalidMessageError(
				`Message tokenCount must be a non-negative integer, got ${String(message.tokenCount)}`,
			);
		}

		const frozen: ContextMessage = Object.freeze({
			...message,
			...(message.toolCalls ? { toolCalls: Object.freeze([...message.toolCalls]) } : {}),
		});
		this.messages.push(frozen);
		this.total += frozen.tokenCount;
		return frozen;
	}

	/** `createMessage` followed by `append`. */
	add(message: ChatMessage): ContextMessage {
		return this.append(this.createMessage(message));
	}

	snapshotForModel(): readonly ContextMessage[] {
		return Object.freeze([...this.messages]);
	}

	/**
	 * Replaces the older part of the history with one summary message once
	 * the total passes the threshold. The pinned system message and the
	 * `keepRecent` newest messages survive, widened so an assistant tool-call
	 * message is never separated from its tool results.
	 *
	 * @throws ContextOverflowError if the history still exceeds `maxTokens`.
	 */
	compressIfNeeded(): CompressionReport {
		const tokensBefore = this.total;
		const unchanged: CompressionReport = {
			compressed: false,
			removedMessages: 0,
			tokensBefore,
			tokensAfter: tokensBefore,
		};

		if (this.total <= this.maxTokens * this.compressionThreshold) {
			return unchanged;
		}

		const pinned = this.messages[0]?.role === 'system' ? 1 : 0;
		let start = Math.max(pinned, this.messages.length - this.keepRecent);
		while (start > pinned && this.messages[start]?.role === 'tool') {
			start--;
		}

		const prefix = this.messages.slice(pinned, start);
		if (prefix.length === 0) {
			this.assertWithinBudget();
			return unchanged;
		}

		const summaryBudget = Math.max(1, Math.floor(this.maxTokens * this.summaryShare));
		const summary = this.createMessage(
			summaryMessage(summarizeMessages(prefix, summaryBudget, this.tokenizer)),
		);

		this.messages = [
			...this.messages.slice(0, pinned),
			Object.freeze(summary),
			...this.messages.slice(start),
		];
		this.total = this.messages.reduce((sum, message) => sum + message.tokenCount, 0);
		this.compressions++;

		logger.debug('Compressed conversation history', {
			removed: prefix.length,
			before: tokensBefore,
			after: this.total,
		});

		this.assertWithinBudget();

		return {
			compressed: true,
			removedMessages: prefix.length,
			tokensBefore,
			tokensAfter: this.total,
		};
	}

	getTokenUsage(): TokenUsage {
		return {
			current: this.total,
			max: this.maxTokens,
			percentage: (this.total / this.maxTokens) * 100,
			compressionCount: this.compressions,
			messageCount: this.messages.length,
		};
	}

	export(): ConversationExport {
		return {
			maxTokens: this.maxTokens,
			tokenTotal: this.total,
			compressionCount: this.compressions,
			messages: this.messages.map((message) => ({
				role: message.role,
				content: message.content,
				tokenCount: message.tokenCount,
				timestamp: new Date(message.timestamp).toISOString(),
				...(message.toolCalls ? { toolCalls: [...message.toolCalls] } : {}),
				...(message.toolCallId ? { toolCallId: message.toolCallId } : {}),
				...(message.toolName ? { toolName: message.toolName } : {}),
			})),
		};
	}

	private assertWithinBudget(): void {
		if (this.total > this.maxTokens) {
			throw new ContextOverflowError(this.total, this.maxTokens);
		}
	}
}
