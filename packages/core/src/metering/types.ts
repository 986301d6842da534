export interface UsageRecord {
	inputTokens: number;
	outputTokens: number;
	totalTokens: number;
}

export interface CostRates {
	inputCostPerMillion: number;
	outputCostPerMillion: number;
}

export interface PricingTable {
	[modelId: string]: CostRates;
}

/** Usage and cost of one model call. */
export interface CallUsageRecord {
	modelId: string;
	iteration: number;
	usage: UsageRecord;
	cost: number;
	timestamp: number;
}

export interface MeteringSummary {
	totalInputTokens: number;
	totalOutputTokens: number;
	totalTokens: number;
	totalCost: number;
	totalCalls: number;
	calls: CallUsageRecord[];
}

// ── Budget ──

export type BudgetExceededReason = 'iteration_limit' | 'time_limit' | 'cost_limit';

export interface BudgetLimits {
	maxIterations: number;
	maxTimeSeconds: number;
	costLimitUsd: number;
}

export type BudgetVerdict = { ok: true } | { ok: false; reason: BudgetExceededReason };

export interface BudgetSnapshot extends BudgetLimits {
	iterationCount: number;
	startedAt: number;
	elapsedMs: number;
	cumulativeCost: number;
	cumulativeModelMs: number;
}

// ── Default pricing (USD per million tokens) ──

export const DEFAULT_COST_RATES: PricingTable = {
	// OpenAI
	'gpt-4o': { inputCostPerMillion: 2.5, outputCostPerMillion: 10.0 },
	'gpt-4o-mini': { inputCostPerMillion: 0.15, outputCostPerMillion: 0.6 },
	'gpt-4.1': { inputCostPerMillion: 2.0, outputCostPerMillion: 8.0 },
	'gpt-4.1-mini': { inputCostPerMillion: 0.4, outputCostPerMillion: 1.6 },
	'o3-mini': { inputCostPerMillion: 1.1, outputCostPerMillion: 4.4 },

	// Anthropic
	'claude-3-5-sonnet': { inputCostPerMillion: 3.0, outputCostPerMillion: 15.0 },
	'claude-3-5-haiku': { inputCostPerMillion: 0.8, outputCostPerMillion: 4.0 },
	'claude-3-haiku': { inputCostPerMillion: 0.25, outputCostPerMillion: 1.25 },

	// Google
	'gemini-1.5-flash': { inputCostPerMillion: 0.075, outputCostPerMillion: 0.3 },
	'gemini-2.0-flash': { inputCostPerMillion: 0.1, outputCostPerMillion: 0.4 },
	'gemini-2.5-flash': { inputCostPerMillion: 0.15, outputCostPerMillion: 0.6 },
	'gemini-2.5-pro': { inputCostPerMillion: 1.25, outputCostPerMillion: 10.0 },
};
