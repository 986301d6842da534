export class SousError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'SousError';
	}
}

// ── Tool catalog ──

export class ToolError extends SousError {
	public readonly toolName: string;

	constructor(toolName: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ToolError';
		this.toolName = toolName;
	}
}

export class UnknownToolError extends ToolError {
	constructor(toolName: string, options?: ErrorOptions) {
		super(toolName, `Unknown tool "${toolName}"`, options);
		this.name = 'UnknownToolError';
	}
}

export class DuplicateToolError extends ToolError {
	constructor(toolName: string, options?: ErrorOptions) {
		super(toolName, `Tool "${toolName}" is already registered`, options);
		this.name = 'DuplicateToolError';
	}
}

export class ToolDefinitionError extends ToolError {
	constructor(toolName: string, reason: string, options?: ErrorOptions) {
		super(toolName, `Invalid definition for tool "${toolName}": ${reason}`, options);
		this.name = 'ToolDefinitionError';
	}
}

export class RegistrySealedError extends ToolError {
	constructor(toolName: string, options?: ErrorOptions) {
		super(toolName, `Cannot register "${toolName}": the tool registry is sealed`, options);
		this.name = 'RegistrySealedError';
	}
}

// ── Conversation ──

export class ConversationError extends SousError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ConversationError';
	}
}

export class InvalidMessageError extends ConversationError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'InvalidMessageError';
	}
}

export class ContextOverflowError extends ConversationError {
	public readonly tokenTotal: number;
	public readonly maxTokens: number;

	constructor(tokenTotal: number, maxTokens: number, options?: ErrorOptions) {
		super(`Conversation still holds ${tokenTotal} tokens after compression (limit ${maxTokens})`, options);
		this.name = 'ContextOverflowError';
		this.tokenTotal = tokenTotal;
		this.maxTokens = maxTokens;
	}
}

// ── Model ──

export class ModelError extends SousError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ModelError';
	}
}

export class ModelTimeoutError extends ModelError {
	public readonly timeoutMs: number;

	constructor(timeoutMs: number, options?: ErrorOptions) {
		super(`Model call exceeded ${timeoutMs}ms`, options);
		this.name = 'ModelTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

export class ModelThrottledError extends ModelError {
	public readonly retryAfterMs?: number;

	constructor(message: string, retryAfterMs?: number, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ModelThrottledError';
		this.retryAfterMs = retryAfterMs;
	}
}

export class ProviderError extends ModelError {
	public readonly provider: string;
	public readonly statusCode?: number;

	constructor(
		provider: string,
		message: string,
		statusCode?: number,
		options?: ErrorOptions,
	) {
		super(`[${provider}] ${message}`, options);
		this.name = 'ProviderError';
		this.provider = provider;
		this.statusCode = statusCode;
	}

	get isRetryable(): boolean {
		if (this.statusCode === undefined) return false;
		return this.statusCode === 429 || this.statusCode >= 500;
	}
}

// ── Orchestration ──

export class IllegalTransitionError extends SousError {
	public readonly from: string;
	public readonly to: string;

	constructor(from: string, to: string, options?: ErrorOptions) {
		super(`Illegal loop transition ${from} -> ${to}`, options);
		this.name = 'IllegalTransitionError';
		this.from = from;
		this.to = to;
	}
}

export class OperationCancelledError extends SousError {
	constructor(message = 'Operation was cancelled', options?: ErrorOptions) {
		super(message, options);
		this.name = 'OperationCancelledError';
	}
}

// ── Configuration ──

export class SchemaViolationError extends SousError {
	public readonly field: string;
	public readonly issues: string[];

	constructor(field: string, issues: string[], options?: ErrorOptions) {
		super(`Validation failed for "${field}": ${issues.join('; ')}`, options);
		this.name = 'SchemaViolationError';
		this.field = field;
		this.issues = issues;
	}
}
