// ── Orchestration ──
export {
	OrchestrationLoop,
	resolveSettings,
	InstructionBuilder,
	interpolate,
	DEFAULT_LOOP_SETTINGS,
	type InstructionBuilderOptions,
	type LoopSettings,
	type IterationEvent,
	type OrchestrationLoopOptions,
	type RunOptions,
	type RunResult,
} from './agent/index.js';

// ── Tools ──
export {
	ToolRegistry,
	ToolExecutor,
	AsyncCache,
	defineTool,
	renderToolResult,
	type ToolExecutorOptions,
	type AsyncCacheOptions,
	type ToolCall,
	type ToolCallSource,
	type ToolContext,
	type ToolDefinition,
	type ToolCatalog,
	type RegisteredTool,
	type ToolErrorKind,
	type ToolResultMetadata,
	type ToolSuccess,
	type ToolFailure,
	type ToolResult,
	type ExecutionScope,
} from './tools/index.js';

// ── Conversation ──
export {
	ConversationContext,
	estimateTokens,
	type ContextMessage,
	type Tokenizer,
	type ConversationContextOptions,
	type CompressionReport,
	type TokenUsage,
	type ConversationExport,
} from './conversation/index.js';

// ── Parsing ──
export {
	ResponseParser,
	FINAL_MESSAGE_MARKER,
	type ParseOutcome,
	type ParseOutcomeKind,
	type FinalMessageOutcome,
	type ToolCallsOutcome,
	type InconclusiveOutcome,
} from './parser/index.js';

// ── Budget & metering ──
export {
	BudgetTracker,
	UsageMeter,
	computeCost,
	DEFAULT_COST_RATES,
	type BudgetLimits,
	type BudgetVerdict,
	type BudgetSnapshot,
	type BudgetExceededReason,
	type PricingTable,
	type CostRates,
	type UsageRecord,
	type MeteringSummary,
} from './metering/index.js';

// ── Tracing ──
export {
	TraceRecorder,
	MemoryTraceSink,
	JsonFileTraceSink,
	serializeTrace,
	type Trace,
	type TraceSink,
	type IterationRecord,
	type IterationOutcome,
	type StateTransition,
	type LoopState,
	type TerminationReason,
} from './trace/index.js';

// ── Model ──
export { type ChatModel, type CompletionOptions, type ModelProvider } from './model/interface.js';
export {
	type ModelCompletion,
	type ModelUsage,
	type StructuredToolCall,
	type ToolSchema,
	type FinishReason,
} from './model/types.js';
export {
	type ChatMessage,
	type MessageRole,
	systemMessage,
	userMessage,
	assistantMessage,
	toolResultMessage,
} from './model/messages.js';
export { zodToJsonSchema } from './model/schema.js';
export { VercelChatModel, type VercelChatModelOptions } from './model/adapters/vercel.js';

// ── Config ──
export { Config, type GlobalConfig } from './config/index.js';

// ── Infrastructure ──
export * from './errors.js';
export { createLogger, errorMessage, setGlobalLogLevel, setLogColors, setLogTimestamps, Logger, type LogFields } from './logging.js';
export { LogLevel, parseLogLevel, type LogLevelName, type DeepPartial } from './types.js';
