export { ConversationContext } from './context.js';
export { estimateTokens, summarizeMessages, SUMMARY_HEADER } from './utils.js';
export {
	type ContextMessage,
	type Tokenizer,
	type ConversationContextOptions,
	type CompressionReport,
	type TokenUsage,
	type SerializedMessage,
	type ConversationExport,
} from './types.js';
