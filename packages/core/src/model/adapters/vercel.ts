import {
	APICallError,
	InvalidToolArgumentsError,
	NoSuchToolError,
	generateText,
	jsonSchema,
	tool,
	type CoreMessage,
	type CoreToolMessage,
	type LanguageModelV1,
	type Tool,
} from 'ai';
import type { ChatModel, CompletionOptions, ModelProvider } from '../interface.js';
import { EMPTY_USAGE, type FinishReason, type ModelCompletion, type ModelUsage, type StructuredToolCall, type ToolSchema } from '../types.js';
import type { ChatMessage } from '../messages.js';
import { ModelError, ModelThrottledError, ProviderError } from '../../errors.js';
import { errorMessage } from '../../logging.js';

export interface VercelChatModelOptions {
	model: LanguageModelV1;
	/** Override provider detection (otherwise inferred from model.provider or modelId). */
	provider?: ModelProvider;
	temperature?: number;
	maxTokens?: number;
	/**
	 * Retries performed inside the SDK. Defaults to 0 so throttling surfaces
	 * to the orchestration loop, which owns the retry budget.
	 */
	maxRetries?: number;
}

interface PreparedPrompt {
	system?: string;
	messages: CoreMessage[];
}

/**
 * ChatModel over the Vercel AI SDK. Tools are declared to the provider from
 * their JSON Schemas without an `execute` function, so the SDK reports tool
 * calls back instead of running them.
 */
export class VercelChatModel implements ChatModel {
	private readonly model: LanguageModelV1;
	private readonly defaultTemperature: number;
	private readonly defaultMaxTokens: number;
	private readonly maxRetries: number;
	private readonly _provider: ModelProvider;

	constructor(options: VercelChatModelOptions) {
		this.model = options.model;
		this.defaultTemperature = options.temperature ?? 0.7;
		this.defaultMaxTokens = options.maxTokens ?? 4096;
		this.maxRetries = options.maxRetries ?? 0;
		this._provider = options.provider ?? inferProvider(this.model.modelId, this.model.provider);
	}

	get modelId(): string {
		return this.model.modelId;
	}

	get provider(): ModelProvider {
		return this._provider;
	}

	async complete(
		messages: readonly ChatMessage[],
		tools: readonly ToolSchema[],
		options: CompletionOptions = {},
	): Promise<ModelCompletion> {
		const prompt = convertMessages(messages);

		try {
			const result = await generateText({
				model: this.model,
				system: prompt.system,
				messages: prompt.messages,
				tools: tools.length > 0 ? convertTools(tools) : undefined,
				temperature: options.temperature ?? this.defaultTemperature,
				maxTokens: options.maxTokens ?? this.defaultMaxTokens,
				maxRetries: this.maxRetries,
				abortSignal: options.signal,
			});

			const toolCalls: StructuredToolCall[] = result.toolCalls.map((call) => ({
				id: call.toolCallId,
				name: call.toolName,
				arguments: call.args,
			}));

			return {
				rawText: result.text,
				toolCalls,
				usage: toUsage(result.usage.promptTokens, result.usage.completionTokens),
				finishReason: mapFinishReason(result.finishReason),
			};
		} catch (error) {
			const rejected = rejectedToolCall(error);
			if (rejected) {
				return { rawText: '', toolCalls: [rejected], usage: EMPTY_USAGE, finishReason: 'tool-calls' };
			}
			throw this.translateError(error);
		}
	}

	private translateError(error: unknown): ModelError {
		if (error instanceof ModelError) return error;
		if (APICallError.isInstance(error)) {
			if (error.statusCode === 429) {
				return new ModelThrottledError(
					error.message,
					parseRetryAfter(error.responseHeaders?.['retry-after']),
					{ cause: error },
				);
			}
			return new ProviderError(this._provider, error.message, error.statusCode, { cause: error });
		}
		return new ModelError(`LLM invocation failed: ${errorMessage(error)}`, { cause: error });
	}
}

/**
 * The SDK rejects a whole response when a tool call names an undeclared tool
 * or carries arguments that are not JSON. That call is passed on unchanged,
 * and the tool executor reports it back to the model.
 */
function rejectedToolCall(error: unknown): StructuredToolCall | undefined {
	if (NoSuchToolError.isInstance(error)) {
		return { name: error.toolName, arguments: {} };
	}
	if (InvalidToolArgumentsError.isInstance(error)) {
		return { name: error.toolName, arguments: error.toolArgs };
	}
	return undefined;
}

// ── Conversion ──

export function convertMessages(messages: readonly ChatMessage[]): PreparedPrompt {
	const prepared: PreparedPrompt = { messages: [] };
	let pinnedSystem = false;

	for (const [index, msg] of messages.entries()) {
		switch (msg.role) {
			case 'system':
				if (index === 0 && !pinnedSystem) {
					prepared.system = msg.content;
					pinnedSystem = true;
				} else {
					prepared.messages.push({ role: 'user', content: msg.content });
				}
				break;

			case 'user':
				prepared.messages.push({ role: 'user', content: msg.content });
				break;

			case 'assistant_internal':
				prepared.messages.push({ role: 'assistant', content: msg.content });
				break;

			case 'assistant': {
				const structured = (msg.toolCalls ?? []).filter((call) => call.source === 'structured');
				if (structured.length === 0) {
					prepared.messages.push({ role: 'assistant', content: msg.content });
					break;
				}
				prepared.messages.push({
					role: 'assistant',
					content: [
						...(msg.content ? [{ type: 'text' as const, text: msg.content }] : []),
						...structured.map((call) => ({
							type: 'tool-call' as const,
							toolCallId: call.id,
							toolName: call.name,
							args: call.arguments,
						})),
					],
				});
				break;
			}

			case 'tool': {
				if (!msg.structured || !msg.toolCallId) {
					prepared.messages.push({
						role: 'user',
						content: `Result of ${msg.toolName ?? 'tool'} (${msg.toolCallId ?? 'unknown call'}):\n${msg.content}`,
					});
					break;
				}
				const part = {
					type: 'tool-result' as const,
					toolCallId: msg.toolCallId,
					toolName: msg.toolName ?? '',
					result: msg.content,
				};
				const previous = prepared.messages[prepared.messages.length - 1];
				if (previous?.role === 'tool') {
					previous.content.push(part);
				} else {
					const toolMessage: CoreToolMessage = { role: 'tool', content: [part] };
					prepared.messages.push(toolMessage);
				}
				break;
			}
		}
	}

	return prepared;
}

function convertTools(tools: readonly ToolSchema[]): Record<string, Tool> {
	const converted: Record<string, Tool> = {};
	for (const schema of tools) {
		converted[schema.name] = tool({
			description: schema.description,
			parameters: jsonSchema(schema.parameters),
		});
	}
	return converted;
}

function toUsage(promptTokens: number, completionTokens: number): ModelUsage {
	const inputTokens = Number.isFinite(promptTokens) ? promptTokens : 0;
	const outputTokens = Number.isFinite(completionTokens) ? completionTokens : 0;
	return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}

function parseRetryAfter(value: string | undefined): number | undefined {
	if (!value) return undefined;
	const seconds = Number.parseFloat(value);
	return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

function mapFinishReason(reason: string): FinishReason {
	switch (reason) {
		case 'stop':
		case 'length':
		case 'content-filter':
		case 'tool-calls':
		case 'error':
			return reason;
		default:
			return 'other';
	}
}

export function inferProvider(modelId: string, providerHint?: string): ModelProvider {
	const hint = (providerHint ?? '').toLowerCase();
	if (hint.includes('anthropic')) return 'anthropic';
	if (hint.includes('openai')) return 'openai';
	if (hint.includes('google') || hint.includes('gemini')) return 'google';

	const id = modelId.toLowerCase();
	if (id.startsWith('claude')) return 'anthropic';
	if (id.startsWith('gpt') || /^o\d/.test(id)) return 'openai';
	if (id.startsWith('gemini')) return 'google';
	return 'custom';
}
