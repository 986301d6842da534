export { ToolRegistry, inspectDefinition } from './registry.js';
export {
	ToolExecutor,
	type ToolExecutorOptions,
	clipPayload,
	serializePayload,
	formatIssues,
} from './executor.js';
export { AsyncCache, type AsyncCacheOptions } from './cache.js';
export {
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
	defineTool,
	renderToolResult,
} from './types.js';
